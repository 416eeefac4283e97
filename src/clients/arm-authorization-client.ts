// Authorization Provider over the Azure Resource Manager REST API
import { v4 as uuidv4 } from 'uuid';
import {
    AuthorizationProvider,
    CreateAssignmentResult,
    isPrincipalType,
    Principal,
    ProviderRoleAssignment,
    RoleDefinition,
    Subscription
} from '../types';
import { AuthenticationError, ErrorHandler, ProviderError } from '../errors';
import { Logger, silentLogger } from '../logging';
import { ARM_SCOPE, TokenSource } from './credentials';
import { isJsonObject, JsonObject, readObject, readPage, readString } from './response';

export const ARM_ENDPOINT = 'https://management.azure.com';

export const ARM_API_VERSIONS = {
    SUBSCRIPTIONS: '2022-12-01',
    AUTHORIZATION: '2022-04-01',
    CLASSIC_ADMINISTRATORS: '2015-07-01'
} as const;

export type FetchLike = ( url: string, init: RequestInit ) => Promise<Response>;

/**
 * Supplies display names and sign-in names for the principal ids ARM returns
 */
export interface PrincipalLookup {
    getPrincipalsByIds( ids: readonly string[] ): Promise<Principal[]>;
}

export interface ArmAuthorizationClientOptions {
    endpoint?: string;
    fetch?: FetchLike;
    logger?: Logger;
}

interface RequestContext {
    subscriptionId?: string;
}

/**
 * Last path segment of a role definition resource id, i.e. its GUID
 */
export function roleDefinitionGuid( roleDefinitionId: string ): string {
    const segments = roleDefinitionId.split( '/' ).filter( segment => segment.length > 0 );
    return segments.length > 0 ? segments[ segments.length - 1 ] : roleDefinitionId;
}

/**
 * Subscription id a scope lives in, if it is subscription-rooted
 */
export function subscriptionOfScope( scope: string ): string | undefined {
    const match = /^\/subscriptions\/([^/]+)/i.exec( scope );
    return match ? match[ 1 ] : undefined;
}

export function toRoleDefinition( item: JsonObject ): RoleDefinition | undefined {
    const id = readString( item, 'name' );
    const properties = readObject( item, 'properties' );
    const roleName = properties ? readString( properties, 'roleName' ) : undefined;
    if ( !id || !properties || !roleName ) {
        return undefined;
    }
    return {
        id,
        name: roleName,
        isCustom: readString( properties, 'type' ) === 'CustomRole',
        payload: properties
    };
}

export class ArmAuthorizationClient implements AuthorizationProvider {
    private tokens: TokenSource;
    private principals: PrincipalLookup;
    private endpoint: string;
    private fetchImpl: FetchLike;
    private logger: Logger;
    private activeSubscriptionId?: string;

    constructor( tokens: TokenSource, principals: PrincipalLookup, options: ArmAuthorizationClientOptions = {} ) {
        this.tokens = tokens;
        this.principals = principals;
        this.endpoint = ( options.endpoint ?? ARM_ENDPOINT ).replace( /\/+$/, '' );
        this.fetchImpl = options.fetch ?? ( ( url, init ) => fetch( url, init ) );
        this.logger = options.logger ?? silentLogger;
    }

    async listSubscriptions(): Promise<Subscription[]> {
        const items = await this.getAll( `/subscriptions?api-version=${ARM_API_VERSIONS.SUBSCRIPTIONS}` );
        const subscriptions: Subscription[] = [];
        for ( const item of items ) {
            const subscriptionId = readString( item, 'subscriptionId' );
            if ( !subscriptionId ) continue;
            subscriptions.push( {
                subscriptionId,
                displayName: readString( item, 'displayName' ) ?? subscriptionId,
                state: readString( item, 'state' ),
                tenantId: readString( item, 'tenantId' )
            } );
        }
        return subscriptions;
    }

    /**
     * Make `subscriptionId` the scope later calls act on. The subscription is
     * read first so an inaccessible one fails here.
     */
    async setActiveScope( subscriptionId: string ): Promise<void> {
        await this.request( 'GET', `/subscriptions/${subscriptionId}?api-version=${ARM_API_VERSIONS.SUBSCRIPTIONS}`, undefined, { subscriptionId } );
        this.activeSubscriptionId = subscriptionId;
    }

    async listRoleAssignments( includeClassicAdministrators: boolean ): Promise<ProviderRoleAssignment[]> {
        const subscriptionId = this.requireScope();
        const items = await this.getAll(
            `/subscriptions/${subscriptionId}/providers/Microsoft.Authorization/roleAssignments?api-version=${ARM_API_VERSIONS.AUTHORIZATION}`,
            { subscriptionId }
        );

        const raw: Array<{ principalId: string; principalType: string; roleDefinitionId: string; scope: string }> = [];
        for ( const item of items ) {
            const properties = readObject( item, 'properties' );
            const principalId = properties && readString( properties, 'principalId' );
            const principalType = properties && readString( properties, 'principalType' );
            const roleDefinitionId = properties && readString( properties, 'roleDefinitionId' );
            const scope = properties && readString( properties, 'scope' );
            if ( principalId && principalType && roleDefinitionId && scope ) {
                raw.push( { principalId, principalType, roleDefinitionId, scope } );
            }
        }

        const directory = new Map<string, Principal>();
        if ( raw.length > 0 ) {
            for ( const principal of await this.principals.getPrincipalsByIds( raw.map( entry => entry.principalId ) ) ) {
                directory.set( principal.id, principal );
            }
        }

        const assignments: ProviderRoleAssignment[] = [];
        for ( const entry of raw ) {
            if ( !isPrincipalType( entry.principalType ) ) {
                this.logger.warn( `Skipping role assignment for ${entry.principalType} ${entry.principalId} at ${entry.scope}` );
                continue;
            }
            const principal = directory.get( entry.principalId );
            if ( !principal ) {
                this.logger.warn( `Principal ${entry.principalId} was not found in the directory; exporting it without a name` );
            }
            assignments.push( {
                objectId: entry.principalId,
                objectType: entry.principalType,
                displayName: principal?.displayName ?? '',
                signInName: entry.principalType === 'User' ? principal?.signInName ?? null : null,
                scope: entry.scope,
                roleDefinitionId: roleDefinitionGuid( entry.roleDefinitionId )
            } );
        }

        if ( includeClassicAdministrators ) {
            assignments.push( ...await this.listClassicAdministrators( subscriptionId ) );
        }
        return assignments;
    }

    async getRoleDefinition( id: string ): Promise<RoleDefinition> {
        const subscriptionId = this.requireScope();
        const body = await this.request(
            'GET',
            `/subscriptions/${subscriptionId}/providers/Microsoft.Authorization/roleDefinitions/${id}?api-version=${ARM_API_VERSIONS.AUTHORIZATION}`,
            undefined,
            { subscriptionId }
        );
        const definition = isJsonObject( body ) ? toRoleDefinition( body ) : undefined;
        if ( !definition ) {
            throw new ProviderError( `Role definition ${id} has an unexpected shape`, 'INVALID_RESPONSE' );
        }
        return definition;
    }

    async listRoleDefinitions(): Promise<RoleDefinition[]> {
        const subscriptionId = this.requireScope();
        const items = await this.getAll(
            `/subscriptions/${subscriptionId}/providers/Microsoft.Authorization/roleDefinitions?api-version=${ARM_API_VERSIONS.AUTHORIZATION}`,
            { subscriptionId }
        );
        const definitions: RoleDefinition[] = [];
        for ( const item of items ) {
            const definition = toRoleDefinition( item );
            if ( definition ) {
                definitions.push( definition );
            }
        }
        return definitions;
    }

    /**
     * Create an assignment under a new GUID. Failures come back as a result;
     * only an authentication failure is thrown.
     */
    async createRoleAssignment( scope: string, objectId: string, roleDefinitionId: string ): Promise<CreateAssignmentResult> {
        const subscriptionId = subscriptionOfScope( scope ) ?? this.requireScope();
        const body = {
            properties: {
                roleDefinitionId: `/subscriptions/${subscriptionId}/providers/Microsoft.Authorization/roleDefinitions/${roleDefinitionId}`,
                principalId: objectId
            }
        };

        try {
            await this.request(
                'PUT',
                `${scope.replace( /\/+$/, '' )}/providers/Microsoft.Authorization/roleAssignments/${uuidv4()}?api-version=${ARM_API_VERSIONS.AUTHORIZATION}`,
                body
            );
            return { ok: true, value: undefined };
        } catch ( error ) {
            const converted = ErrorHandler.toProviderError( error );
            if ( converted instanceof AuthenticationError ) {
                throw converted;
            }
            return { ok: false, error: converted };
        }
    }

    private async listClassicAdministrators( subscriptionId: string ): Promise<ProviderRoleAssignment[]> {
        const items = await this.getAll(
            `/subscriptions/${subscriptionId}/providers/Microsoft.Authorization/classicAdministrators?api-version=${ARM_API_VERSIONS.CLASSIC_ADMINISTRATORS}`,
            { subscriptionId }
        );
        const administrators: ProviderRoleAssignment[] = [];
        for ( const item of items ) {
            const properties = readObject( item, 'properties' );
            const emailAddress = properties && readString( properties, 'emailAddress' );
            const role = properties && readString( properties, 'role' );
            if ( !emailAddress || !role ) continue;
            administrators.push( {
                objectId: '',
                objectType: 'User',
                displayName: emailAddress,
                signInName: emailAddress,
                scope: `/subscriptions/${subscriptionId}`,
                roleDefinitionId: '',
                roleDefinitionName: role
            } );
        }
        return administrators;
    }

    private requireScope(): string {
        if ( !this.activeSubscriptionId ) {
            throw new ProviderError( 'No active subscription selected', 'NO_ACTIVE_SCOPE' );
        }
        return this.activeSubscriptionId;
    }

    private async getAll( path: string, context: RequestContext = {} ): Promise<JsonObject[]> {
        const items: JsonObject[] = [];
        let next: string | undefined = path;
        while ( next ) {
            const page = readPage( await this.request( 'GET', next, undefined, context ) );
            items.push( ...page.items );
            next = page.nextLink;
        }
        return items;
    }

    private async request( method: 'GET' | 'PUT', pathOrUrl: string, body?: unknown, context: RequestContext = {} ): Promise<unknown> {
        const url = pathOrUrl.startsWith( 'https://' ) ? pathOrUrl : `${this.endpoint}${pathOrUrl}`;
        const token = await this.tokens.getToken( ARM_SCOPE );

        let response: Response;
        try {
            response = await this.fetchImpl( url, {
                method,
                headers: {
                    'Authorization': `Bearer ${token}`,
                    'Content-Type': 'application/json'
                },
                body: body === undefined ? undefined : JSON.stringify( body )
            } );
        } catch ( error ) {
            throw new ProviderError(
                `Network error calling Azure Resource Manager: ${error instanceof Error ? error.message : String( error )}`,
                'NETWORK_ERROR',
                undefined,
                { url }
            );
        }

        const text = await response.text();
        let parsed: unknown = undefined;
        if ( text ) {
            try {
                parsed = JSON.parse( text );
            } catch {
                parsed = { message: text };
            }
        }

        if ( !response.ok ) {
            throw ErrorHandler.fromArmResponse( response.status, parsed, { subscriptionId: context.subscriptionId, url } );
        }
        return parsed;
    }
}
