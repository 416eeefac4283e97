// Interchange format - CSV and JSON encoding of role assignment records
import { isPrincipalType, RoleAssignmentRecord } from '../types';
import { ValidationError } from '../errors';

export const CSV_COLUMNS = [
    'ObjectId',
    'DisplayName',
    'ObjectType',
    'Scope',
    'SignInName',
    'RoleDefinitionId',
    'RoleDefinitionName'
] as const;

export type CsvColumn = typeof CSV_COLUMNS[ number ];

export interface RejectedRow {
    line: number;
    reason: string;
}

export interface ParseResult {
    records: RoleAssignmentRecord[];
    rejected: RejectedRow[];
}

function quote( value: string ): string {
    return `"${value.replace( /"/g, '""' )}"`;
}

function toRow( record: RoleAssignmentRecord ): Record<CsvColumn, string> {
    return {
        ObjectId: record.objectId,
        DisplayName: record.displayName,
        ObjectType: record.objectType,
        Scope: record.scope,
        SignInName: record.signInName ?? '',
        RoleDefinitionId: record.roleDefinitionId,
        RoleDefinitionName: record.roleDefinitionName
    };
}

export function serializeCsv( records: readonly RoleAssignmentRecord[] ): string {
    const lines = [ CSV_COLUMNS.map( quote ).join( ',' ) ];
    for ( const record of records ) {
        const row = toRow( record );
        lines.push( CSV_COLUMNS.map( column => quote( row[ column ] ) ).join( ',' ) );
    }
    return lines.join( '\r\n' ) + '\r\n';
}

interface CsvLine {
    line: number;
    fields: string[];
}

/**
 * Split CSV text into rows of fields. Quoted fields may hold commas, doubled
 * quotes and line breaks; `line` is the 1-based line a row starts on.
 */
export function tokenizeCsv( text: string ): CsvLine[] {
    const rows: CsvLine[] = [];
    let fields: string[] = [];
    let field = '';
    let quoted = false;
    let line = 1;
    let rowStart = 1;
    let rowHasContent = false;

    const endField = () => {
        fields.push( field );
        field = '';
    };
    const endRow = () => {
        endField();
        if ( rowHasContent || fields.length > 1 || fields[ 0 ] !== '' ) {
            rows.push( { line: rowStart, fields } );
        }
        fields = [];
        rowHasContent = false;
    };

    for ( let i = 0; i < text.length; i++ ) {
        const char = text[ i ];

        if ( quoted ) {
            if ( char === '"' ) {
                if ( text[ i + 1 ] === '"' ) {
                    field += '"';
                    i++;
                } else {
                    quoted = false;
                }
            } else {
                if ( char === '\n' ) line++;
                field += char;
            }
            continue;
        }

        switch ( char ) {
            case '"':
                quoted = true;
                rowHasContent = true;
                break;
            case ',':
                endField();
                break;
            case '\r':
                if ( text[ i + 1 ] !== '\n' ) {
                    endRow();
                    line++;
                    rowStart = line;
                }
                break;
            case '\n':
                endRow();
                line++;
                rowStart = line;
                break;
            default:
                field += char;
        }
    }

    if ( quoted ) {
        throw new ValidationError( `Unterminated quoted field starting on line ${rowStart}` );
    }
    if ( field !== '' || fields.length > 0 || rowHasContent ) {
        endRow();
    }

    return rows;
}

/**
 * Parse exported CSV. Header columns may come in any order; a missing column is
 * a ValidationError, while bad rows are returned in `rejected`.
 */
export function parseCsv( text: string ): ParseResult {
    const rows = tokenizeCsv( text.replace( /^\uFEFF/, '' ) );

    // Some exporters prefix a "#TYPE ..." type-information line
    if ( rows.length > 0 && rows[ 0 ].fields[ 0 ].startsWith( '#TYPE' ) ) {
        rows.shift();
    }

    const header = rows.shift();
    if ( !header ) {
        throw new ValidationError( 'The file has no header row' );
    }

    const positions = new Map<string, number>();
    header.fields.forEach( ( name, index ) => positions.set( name.trim(), index ) );
    const missing = CSV_COLUMNS.filter( column => !positions.has( column ) );
    if ( missing.length > 0 ) {
        throw new ValidationError( `Missing column(s): ${missing.join( ', ' )}`, { columns: header.fields } );
    }

    const result: ParseResult = { records: [], rejected: [] };
    for ( const row of rows ) {
        const values: Record<string, string> = {};
        for ( const column of CSV_COLUMNS ) {
            values[ column ] = row.fields[ positions.get( column ) ?? -1 ] ?? '';
        }
        const parsed = toRecord( values, row.line );
        if ( 'reason' in parsed ) {
            result.rejected.push( parsed );
        } else {
            result.records.push( parsed );
        }
    }
    return result;
}

export function serializeJson( records: readonly RoleAssignmentRecord[] ): string {
    return JSON.stringify( records.map( toRow ), null, 2 );
}

/**
 * Parse the JSON variant: an array of objects keyed by the CSV column names
 */
export function parseJson( text: string ): ParseResult {
    let data: unknown;
    try {
        data = JSON.parse( text.replace( /^\uFEFF/, '' ) );
    } catch ( error ) {
        throw new ValidationError( `Invalid JSON: ${error instanceof Error ? error.message : String( error )}` );
    }
    if ( !Array.isArray( data ) ) {
        throw new ValidationError( 'Expected a JSON array of role assignments' );
    }

    const result: ParseResult = { records: [], rejected: [] };
    data.forEach( ( item: unknown, index: number ) => {
        const position = index + 1;
        if ( typeof item !== 'object' || item === null ) {
            result.rejected.push( { line: position, reason: 'Entry is not an object' } );
            return;
        }
        const values: Record<string, string> = {};
        for ( const column of CSV_COLUMNS ) {
            const value: unknown = Reflect.get( item, column );
            values[ column ] = typeof value === 'string' ? value : '';
        }
        const parsed = toRecord( values, position );
        if ( 'reason' in parsed ) {
            result.rejected.push( parsed );
        } else {
            result.records.push( parsed );
        }
    } );
    return result;
}

function toRecord( values: Record<string, string>, line: number ): RoleAssignmentRecord | RejectedRow {
    const objectType = values.ObjectType.trim();
    if ( !objectType ) {
        return { line, reason: 'ObjectType is empty' };
    }
    if ( !isPrincipalType( objectType ) ) {
        return { line, reason: `Unsupported ObjectType "${objectType}"` };
    }
    if ( !values.Scope ) {
        return { line, reason: 'Scope is empty' };
    }

    return {
        objectId: values.ObjectId,
        objectType,
        displayName: values.DisplayName,
        signInName: values.SignInName === '' ? null : values.SignInName,
        scope: values.Scope,
        roleDefinitionId: values.RoleDefinitionId,
        roleDefinitionName: values.RoleDefinitionName
    };
}
