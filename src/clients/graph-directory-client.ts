// Directory Provider over Microsoft Graph
import { Client } from '@microsoft/microsoft-graph-client';
import { DirectoryProvider, Principal, PrincipalType, VerifiedDomain } from '../types';
import { ErrorHandler } from '../errors';
import { GRAPH_SCOPE, TokenSource } from './credentials';
import { JsonObject, readPage, readString } from './response';

/**
 * The part of the Graph SDK request builder this client relies on
 */
export interface GraphRequestLike {
    select( properties: string ): GraphRequestLike;
    filter( filter: string ): GraphRequestLike;
    get(): Promise<unknown>;
    post( content: unknown ): Promise<unknown>;
}

export interface GraphApi {
    api( path: string ): GraphRequestLike;
}

// getByIds accepts at most this many ids per call
const GET_BY_IDS_LIMIT = 1000;

const ODATA_TYPES: Record<string, PrincipalType> = {
    '#microsoft.graph.user': 'User',
    '#microsoft.graph.group': 'Group',
    '#microsoft.graph.servicePrincipal': 'ServicePrincipal'
};

export function createGraphApi( tokens: TokenSource ): GraphApi {
    return Client.initWithMiddleware( {
        authProvider: {
            getAccessToken: () => tokens.getToken( GRAPH_SCOPE )
        }
    } );
}

/**
 * Quote a value for an OData `eq` filter. `#` is sent percent-encoded, as
 * guest user principal names carry `#EXT#`.
 */
export function odataLiteral( value: string ): string {
    return `'${value.replace( /'/g, "''" ).replace( /#/g, '%23' )}'`;
}

export function toPrincipal( item: JsonObject, fallbackType?: PrincipalType ): Principal | undefined {
    const id = readString( item, 'id' );
    const odataType = readString( item, '@odata.type' );
    const principalType = odataType ? ODATA_TYPES[ odataType ] : fallbackType;
    if ( !id || !principalType ) {
        return undefined;
    }

    const principal: Principal = {
        id,
        displayName: readString( item, 'displayName' ) ?? '',
        principalType
    };
    const signInName = readString( item, 'userPrincipalName' );
    if ( principalType === 'User' && signInName ) {
        principal.signInName = signInName;
    }
    return principal;
}

export class GraphDirectoryClient implements DirectoryProvider {
    private graph: GraphApi;

    constructor( graph: GraphApi ) {
        this.graph = graph;
    }

    async findGroupByDisplayName( name: string ): Promise<Principal[]> {
        const items = await this.getAll(
            this.graph.api( '/groups' )
                .filter( `displayName eq ${odataLiteral( name )}` )
                .select( 'id,displayName' ),
            `find group "${name}"`
        );
        return this.toPrincipals( items, 'Group' );
    }

    async findUserBySignInName( name: string ): Promise<Principal[]> {
        const items = await this.getAll(
            this.graph.api( '/users' )
                .filter( `userPrincipalName eq ${odataLiteral( name )}` )
                .select( 'id,displayName,userPrincipalName' ),
            `find user "${name}"`
        );
        return this.toPrincipals( items, 'User' );
    }

    async listGroupMembers( groupId: string ): Promise<Principal[]> {
        const items = await this.getAll(
            // Nested groups count: their members hold the role too
            this.graph.api( `/groups/${groupId}/transitiveMembers` )
                .select( 'id,displayName,userPrincipalName' ),
            `list members of group ${groupId}`
        );
        // Devices and contacts have no place in a role assignment
        return this.toPrincipals( items );
    }

    async listVerifiedDomains(): Promise<VerifiedDomain[]> {
        const items = await this.getAll( this.graph.api( '/domains' ), 'list domains' );
        const domains: VerifiedDomain[] = [];
        for ( const item of items ) {
            const name = readString( item, 'id' );
            if ( name && item.isVerified === true ) {
                domains.push( { name, isInitial: item.isInitial === true } );
            }
        }
        return domains;
    }

    /**
     * Look up users, groups and service principals by object id. Ids that no
     * longer exist are simply absent from the result.
     */
    async getPrincipalsByIds( ids: readonly string[] ): Promise<Principal[]> {
        const unique = [ ...new Set( ids ) ];
        const principals: Principal[] = [];

        for ( let i = 0; i < unique.length; i += GET_BY_IDS_LIMIT ) {
            const chunk = unique.slice( i, i + GET_BY_IDS_LIMIT );
            let response: unknown;
            try {
                response = await this.graph.api( '/directoryObjects/getByIds' )
                    .select( 'id,displayName,userPrincipalName' )
                    .post( { ids: chunk, types: [ 'user', 'group', 'servicePrincipal' ] } );
            } catch ( error ) {
                throw ErrorHandler.fromGraphError( error, { operation: 'getByIds', count: chunk.length } );
            }
            principals.push( ...this.toPrincipals( readPage( response ).items ) );
        }

        return principals;
    }

    private async getAll( request: GraphRequestLike, operation: string ): Promise<JsonObject[]> {
        const items: JsonObject[] = [];
        try {
            let page = readPage( await request.get() );
            items.push( ...page.items );
            while ( page.nextLink ) {
                page = readPage( await this.graph.api( page.nextLink ).get() );
                items.push( ...page.items );
            }
        } catch ( error ) {
            throw ErrorHandler.fromGraphError( error, { operation } );
        }
        return items;
    }

    private toPrincipals( items: JsonObject[], fallbackType?: PrincipalType ): Principal[] {
        const principals: Principal[] = [];
        for ( const item of items ) {
            const principal = toPrincipal( item, fallbackType );
            if ( principal ) {
                principals.push( principal );
            }
        }
        return principals;
    }
}
