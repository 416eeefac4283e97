// Readers for untyped JSON returned by Microsoft Graph and Azure Resource Manager
export type JsonObject = Record<string, unknown>;

export function isJsonObject( value: unknown ): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray( value );
}

export function readString( source: JsonObject, key: string ): string | undefined {
    const value = source[ key ];
    return typeof value === 'string' ? value : undefined;
}

export function readObject( source: JsonObject, key: string ): JsonObject | undefined {
    const value = source[ key ];
    return isJsonObject( value ) ? value : undefined;
}

export interface Page {
    items: JsonObject[];
    nextLink?: string;
}

/**
 * Read one page of a `{ value: [...], nextLink | @odata.nextLink }` collection
 */
export function readPage( body: unknown ): Page {
    if ( !isJsonObject( body ) ) {
        return { items: [] };
    }
    const value = body.value;
    return {
        items: Array.isArray( value ) ? value.filter( isJsonObject ) : [],
        nextLink: readString( body, 'nextLink' ) ?? readString( body, '@odata.nextLink' )
    };
}
