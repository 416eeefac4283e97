// Principal Resolver - maps exported principals onto objects in the target directory
import { DirectoryProvider, Principal, ResolvedPrincipal, Result, RoleAssignmentRecord } from '../types';
import { ResolveError } from '../errors';
import { DirectoryDomains, normalizeSignInName } from '../identity';

/** Classic co-administrators have no RBAC role of their own */
export const CO_ADMINISTRATOR_ROLE_NAME = 'CoAdministrator';

/** Built-in Owner role, the RBAC equivalent of a classic service administrator */
export const OWNER_ROLE_DEFINITION_ID = '8e3af657-a8ff-443c-a75c-2fe8c4bcb635';

export type LookupResult =
    | { kind: 'NotFound' }
    | { kind: 'Unique'; principal: Principal }
    | { kind: 'Ambiguous'; matches: Principal[] };

export type ResolveResult = Result<ResolvedPrincipal, ResolveError>;

export interface RoleTarget {
    scope: string;
    roleDefinitionId: string;
}

export function classifyMatches( matches: Principal[] ): LookupResult {
    if ( matches.length === 0 ) {
        return { kind: 'NotFound' };
    }
    if ( matches.length === 1 ) {
        return { kind: 'Unique', principal: matches[ 0 ] };
    }
    return { kind: 'Ambiguous', matches };
}

export function isCoAdministrator( record: RoleAssignmentRecord ): boolean {
    return record.roleDefinitionName.toLowerCase() === CO_ADMINISTRATOR_ROLE_NAME.toLowerCase();
}

/**
 * Scope and role definition the assignment is created with. Co-administrators
 * become Owners of the target subscription whatever was recorded.
 */
export function resolveRoleTarget( record: RoleAssignmentRecord, targetSubscriptionId: string ): RoleTarget {
    if ( isCoAdministrator( record ) ) {
        return {
            scope: `/subscriptions/${targetSubscriptionId}`,
            roleDefinitionId: OWNER_ROLE_DEFINITION_ID
        };
    }
    return { scope: record.scope, roleDefinitionId: record.roleDefinitionId };
}

export class PrincipalResolver {
    private directory: DirectoryProvider;
    private domains: DirectoryDomains;

    constructor( directory: DirectoryProvider, domains: DirectoryDomains ) {
        this.directory = directory;
        this.domains = domains;
    }

    /**
     * Find the one target-directory object a record refers to.
     * Provider failures propagate; only lookup outcomes become ResolveErrors.
     */
    async resolve( record: RoleAssignmentRecord ): Promise<ResolveResult> {
        switch ( record.objectType ) {
            case 'Group':
                return this.resolveGroup( record );
            case 'User':
                return this.resolveUser( record );
            case 'ServicePrincipal':
                return {
                    ok: false,
                    error: new ResolveError(
                        'Unsupported',
                        `Service principal "${record.displayName}" must be assigned "${record.roleDefinitionName}" at ${record.scope} manually`,
                        { objectId: record.objectId }
                    )
                };
        }
    }

    private async resolveGroup( record: RoleAssignmentRecord ): Promise<ResolveResult> {
        const lookup = classifyMatches( await this.directory.findGroupByDisplayName( record.displayName ) );
        return this.toResult( lookup, record, `Group "${record.displayName}"` );
    }

    private async resolveUser( record: RoleAssignmentRecord ): Promise<ResolveResult> {
        if ( !record.signInName ) {
            return {
                ok: false,
                error: new ResolveError( 'NotFound', `User "${record.displayName}" has no sign-in name to look up`, { objectId: record.objectId } )
            };
        }

        const { loginName } = normalizeSignInName( record.signInName, this.domains );
        const lookup = classifyMatches( await this.directory.findUserBySignInName( loginName ) );
        return this.toResult( lookup, record, `User "${loginName}"` );
    }

    private toResult( lookup: LookupResult, record: RoleAssignmentRecord, label: string ): ResolveResult {
        switch ( lookup.kind ) {
            case 'Unique':
                return {
                    ok: true,
                    value: { objectId: lookup.principal.id, objectType: record.objectType }
                };
            case 'NotFound':
                return {
                    ok: false,
                    error: new ResolveError( 'NotFound', `${label} was not found in the target directory`, { sourceObjectId: record.objectId } )
                };
            case 'Ambiguous':
                return {
                    ok: false,
                    error: new ResolveError( 'Ambiguous', `${label} matched ${lookup.matches.length} objects in the target directory`, {
                        sourceObjectId: record.objectId,
                        candidates: lookup.matches.map( match => match.id )
                    } )
                };
        }
    }
}
