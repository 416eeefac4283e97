// Export Store - writes exports and import reports to disk and reads records back
import * as fs from 'fs/promises';
import * as path from 'path';
import { ExportResult, ExportSink } from '../collector';
import { parseCsv, parseJson, ParseResult, serializeCsv } from '../interchange';
import { ValidationError } from '../errors';
import { Logger, silentLogger } from '../logging';
import { ReconcileReport } from '../reporter';

export const ROLE_ASSIGNMENTS_FILE = 'RoleAssignments.csv';
export const ROLE_DEFINITIONS_FILE = 'RoleDefinitions.json';
export const EXPORT_FAILURES_FILE = 'ExportFailures.json';
export const EXPORT_ITEM_FAILURES_FILE = 'ExportItemFailures.json';

/**
 * Make `name` usable as a single file name on Windows, macOS and Linux
 */
export function sanitizeFileName( name: string ): string {
    // eslint-disable-next-line no-control-regex
    const cleaned = name.replace( /[<>:"/\\|?*\u0000-\u001f]/g, '_' ).trim().replace( /[. ]+$/, '' );
    return cleaned.length > 0 ? cleaned : '_';
}

function isAlreadyExists( error: unknown ): boolean {
    return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

export class ExportStore implements ExportSink {
    private readonly outputDirectory: string;
    private logger: Logger;

    constructor( outputDirectory: string, logger: Logger = silentLogger ) {
        this.outputDirectory = outputDirectory;
        this.logger = logger;
    }

    getOutputDirectory(): string {
        return this.outputDirectory;
    }

    /**
     * Write a finished export. Group snapshots already on disk are kept as they are.
     */
    async write( result: ExportResult ): Promise<void> {
        await fs.mkdir( this.outputDirectory, { recursive: true } );

        await fs.writeFile( path.join( this.outputDirectory, ROLE_ASSIGNMENTS_FILE ), serializeCsv( result.assignments ), 'utf8' );

        for ( const scope of result.scopes ) {
            const directory = path.join( this.outputDirectory, 'subscriptions', sanitizeFileName( scope.subscription.subscriptionId ) );
            await fs.mkdir( directory, { recursive: true } );
            await fs.writeFile( path.join( directory, ROLE_ASSIGNMENTS_FILE ), serializeCsv( scope.assignments ), 'utf8' );
        }

        await this.writeJson( path.join( this.outputDirectory, ROLE_DEFINITIONS_FILE ), result.roleDefinitions );

        if ( result.customRoleDefinitions.length > 0 ) {
            const directory = path.join( this.outputDirectory, 'CustomRoles' );
            await fs.mkdir( directory, { recursive: true } );
            for ( const role of result.customRoleDefinitions ) {
                await this.writeJson( path.join( directory, `${sanitizeFileName( role.name )}.json` ), role.definition );
            }
        }

        if ( result.groupSnapshots.length > 0 ) {
            const directory = path.join( this.outputDirectory, 'Groups' );
            await fs.mkdir( directory, { recursive: true } );
            for ( const snapshot of result.groupSnapshots ) {
                const file = path.join( directory, `${sanitizeFileName( snapshot.groupDisplayName )}.json` );
                try {
                    await this.writeJson( file, snapshot, 'wx' );
                } catch ( error ) {
                    if ( !isAlreadyExists( error ) ) {
                        throw error;
                    }
                    this.logger.debug( `Keeping existing membership snapshot ${file}` );
                }
            }
        }

        if ( result.failures.length > 0 ) {
            await this.writeJson( path.join( this.outputDirectory, EXPORT_FAILURES_FILE ), result.failures.map( failure => ( {
                subscriptionId: failure.subscriptionId,
                displayName: failure.displayName,
                code: failure.error.code,
                message: failure.error.userMessage
            } ) ) );
        }

        if ( result.itemFailures.length > 0 ) {
            await this.writeJson( path.join( this.outputDirectory, EXPORT_ITEM_FAILURES_FILE ), result.itemFailures.map( failure => ( {
                subscriptionId: failure.subscriptionId,
                subject: failure.subject,
                code: failure.error.code,
                message: failure.error.userMessage
            } ) ) );
        }

        this.logger.info( `Export written to ${this.outputDirectory}` );
    }

    /**
     * Load records from a `.csv` or `.json` export
     */
    async readRecords( file: string ): Promise<ParseResult> {
        const extension = path.extname( file ).toLowerCase();
        if ( extension !== '.csv' && extension !== '.json' ) {
            throw new ValidationError( `Unsupported file type "${extension || file}"; expected .csv or .json`, { file } );
        }

        let text: string;
        try {
            text = await fs.readFile( file, 'utf8' );
        } catch ( error ) {
            throw new ValidationError( `Cannot read ${file}: ${error instanceof Error ? error.message : 'Unknown error'}`, { file } );
        }

        return extension === '.csv' ? parseCsv( text ) : parseJson( text );
    }

    /**
     * Write an import report next to the export; returns the file written
     */
    async writeReport( report: ReconcileReport ): Promise<string> {
        await fs.mkdir( this.outputDirectory, { recursive: true } );
        const file = path.join( this.outputDirectory, `ImportReport-${sanitizeFileName( report.runId )}.json` );
        await this.writeJson( file, report );
        return file;
    }

    private async writeJson( file: string, data: unknown, flag: 'w' | 'wx' = 'w' ): Promise<void> {
        await fs.writeFile( file, JSON.stringify( data, null, 2 ), { encoding: 'utf8', flag } );
    }
}
