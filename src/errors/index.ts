// Error Handling for rbac-migrate

/**
 * Base error class for all rbac-migrate errors
 */
export abstract class MigrationError extends Error {
    public readonly code: string;
    public readonly timestamp: Date;
    public readonly context?: Record<string, unknown>;
    public readonly userMessage: string;

    constructor(
        message: string,
        code: string,
        userMessage?: string,
        context?: Record<string, unknown>
    ) {
        super( message );
        this.name = this.constructor.name;
        this.code = code;
        this.timestamp = new Date();
        this.context = context;
        this.userMessage = userMessage || message;

        if ( Error.captureStackTrace ) {
            Error.captureStackTrace( this, this.constructor );
        }
    }

    /**
     * Get formatted error message for user display
     */
    getDisplayMessage(): string {
        return `[${this.code}] ${this.userMessage}`;
    }

    /**
     * Get detailed error information for logging
     */
    getDetailedInfo(): Record<string, unknown> {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            userMessage: this.userMessage,
            timestamp: this.timestamp.toISOString(),
            context: this.context,
            stack: this.stack
        };
    }
}

export class ConfigurationError extends MigrationError {
    constructor( message: string, context?: Record<string, unknown> ) {
        super(
            message,
            'CONFIG_ERROR',
            `Configuration error: ${message}. Please check your environment variables or config files.`,
            context
        );
    }
}

export class ValidationError extends MigrationError {
    constructor( message: string, context?: Record<string, unknown> ) {
        super(
            message,
            'VALIDATION_ERROR',
            `Validation failed: ${message}`,
            context
        );
    }
}

/**
 * Sign-in to the directory or the management API failed. Fatal: aborts the run.
 */
export class AuthenticationError extends MigrationError {
    constructor( message: string, context?: Record<string, unknown> ) {
        super(
            message,
            'AUTHENTICATION_FAILED',
            'Azure authentication failed. Please check your Azure credentials (tenant ID, client ID, and client secret).',
            context
        );
    }
}

/**
 * The signed-in identity cannot read a subscription. The scope is skipped and the run continues.
 */
export class ScopeAccessDeniedError extends MigrationError {
    public readonly subscriptionId: string;

    constructor( subscriptionId: string, message: string, context?: Record<string, unknown> ) {
        super(
            message,
            'SCOPE_ACCESS_DENIED',
            `Access to subscription ${subscriptionId} was denied: ${message}`,
            { ...context, subscriptionId }
        );
        this.subscriptionId = subscriptionId;
    }
}

/**
 * A call to the directory or authorization API failed for one item.
 */
export class ProviderError extends MigrationError {
    public readonly statusCode?: number;

    constructor(
        message: string,
        code: string = 'PROVIDER_ERROR',
        statusCode?: number,
        context?: Record<string, unknown>
    ) {
        super( message, code, ProviderError.getUserMessage( code, message ), { ...context, statusCode } );
        this.statusCode = statusCode;
    }

    private static getUserMessage( code: string, message: string ): string {
        switch ( code ) {
            case 'RoleAssignmentExists':
                return 'The role assignment already exists.';
            case 'PrincipalNotFound':
                return 'The principal does not exist in the target directory yet. Wait for replication and try again.';
            case 'RoleDefinitionDoesNotExist':
                return 'The role definition does not exist in the target subscription. Import custom roles first.';
            case 'InvalidRoleAssignmentScope':
            case 'InvalidScope':
                return `The scope is not valid in the target subscription: ${message}`;
            case 'TIMEOUT':
                return `The request timed out: ${message}`;
            default:
                return `Azure API error: ${message}`;
        }
    }
}

export type ResolveErrorReason = 'NotFound' | 'Ambiguous' | 'Unsupported';

/**
 * A record's principal could not be mapped to exactly one object in the target directory.
 */
export class ResolveError extends MigrationError {
    public readonly reason: ResolveErrorReason;

    constructor( reason: ResolveErrorReason, message: string, context?: Record<string, unknown> ) {
        super( message, `RESOLVE_${reason.toUpperCase()}`, ResolveError.getUserMessage( reason, message ), context );
        this.reason = reason;
    }

    private static getUserMessage( reason: ResolveErrorReason, message: string ): string {
        switch ( reason ) {
            case 'NotFound':
                return `No matching principal in the target directory: ${message}`;
            case 'Ambiguous':
                return `More than one principal matches; assign this role manually: ${message}`;
            case 'Unsupported':
                return `Manual assignment required: ${message}`;
        }
    }
}

interface ApiErrorBody {
    code?: string;
    message?: string;
}

function readApiErrorBody( value: unknown ): ApiErrorBody {
    if ( typeof value !== 'object' || value === null ) {
        return {};
    }
    const body: ApiErrorBody = {};
    if ( 'code' in value && typeof value.code === 'string' ) body.code = value.code;
    if ( 'message' in value && typeof value.message === 'string' ) body.message = value.message;
    if ( 'error' in value && !body.code ) {
        return { ...readApiErrorBody( value.error ), ...body };
    }
    return body;
}

/**
 * Error handler utility functions
 */
export class ErrorHandler {
    /**
     * Handle and format errors for CLI display, then exit with status 1
     */
    static handleError( error: unknown, context?: string ): never {
        const displayError = ErrorHandler.normalize( error, context );

        console.error( 'Error Details:', JSON.stringify( displayError.getDetailedInfo(), null, 2 ) );
        console.error( `\nError: ${displayError.getDisplayMessage()}` );

        if ( context ) {
            console.error( `Context: ${context}` );
        }

        process.exit( 1 );
    }

    static normalize( error: unknown, context?: string ): MigrationError {
        if ( error instanceof MigrationError ) {
            return error;
        }
        if ( error instanceof Error ) {
            return new ValidationError(
                `An unexpected error occurred: ${error.message}`,
                { originalError: error.name, context }
            );
        }
        return new ValidationError(
            'An unexpected error occurred',
            { originalError: String( error ), context }
        );
    }

    /**
     * Errors that abort a whole run rather than one scope or record
     */
    static isFatal( error: unknown ): boolean {
        return error instanceof AuthenticationError || error instanceof ConfigurationError;
    }

    /**
     * Map a failed Azure Resource Manager response to an error
     */
    static fromArmResponse( status: number, body: unknown, context: { subscriptionId?: string; url?: string } = {} ): MigrationError {
        const { code, message } = readApiErrorBody( body );
        const text = message || `Azure Resource Manager request failed with status ${status}`;

        if ( status === 401 ) {
            return new AuthenticationError( text, { ...context, armErrorCode: code } );
        }
        if ( status === 403 && context.subscriptionId ) {
            return new ScopeAccessDeniedError( context.subscriptionId, text, { url: context.url, armErrorCode: code } );
        }
        return new ProviderError( text, code || `HTTP_${status}`, status, { url: context.url } );
    }

    /**
     * Map an error thrown by the Microsoft Graph client to an error
     */
    static fromGraphError( error: unknown, context?: Record<string, unknown> ): MigrationError {
        if ( error instanceof MigrationError ) {
            return error;
        }

        const { code, message } = readApiErrorBody( error );
        const statusCode = typeof error === 'object' && error !== null && 'statusCode' in error && typeof error.statusCode === 'number'
            ? error.statusCode
            : undefined;
        const text = message || ( error instanceof Error ? error.message : 'Unknown Microsoft Graph error' );

        // The SDK rewraps anything its auth provider throws as a GraphError whose code is the original error's name
        if ( statusCode === 401 || code === 'InvalidAuthenticationToken' || code === 'AuthenticationError' ) {
            return new AuthenticationError( text, { ...context, graphErrorCode: code } );
        }
        return new ProviderError( text, code || 'GRAPH_ERROR', statusCode, context );
    }

    /**
     * Turn anything thrown by a provider call into a per-item ProviderError,
     * letting fatal errors through untouched
     */
    static toProviderError( error: unknown ): ProviderError | AuthenticationError {
        if ( error instanceof ProviderError || error instanceof AuthenticationError ) {
            return error;
        }
        if ( error instanceof MigrationError ) {
            return new ProviderError( error.message, error.code, undefined, error.context );
        }
        return new ProviderError( error instanceof Error ? error.message : String( error ) );
    }
}
