// Type definitions for rbac-migrate
import type { ProviderError } from '../errors';

export const PRINCIPAL_TYPES = [ 'User', 'Group', 'ServicePrincipal' ] as const;

export type PrincipalType = typeof PRINCIPAL_TYPES[ number ];

/**
 * One principal-to-role-to-scope binding as exported from a source subscription.
 *
 * `objectId` and `roleDefinitionId` are only meaningful in the source tenant;
 * the reconciler never reuses `objectId` and re-resolves the principal instead.
 */
export interface RoleAssignmentRecord {
    readonly objectId: string;
    readonly objectType: PrincipalType;
    readonly displayName: string;
    // null when the principal has none; the interchange files read an empty value back as null
    readonly signInName: string | null;
    readonly scope: string;
    readonly roleDefinitionId: string;
    readonly roleDefinitionName: string;
}

/**
 * A role assignment as the Authorization Provider returns it; the role
 * display name may be missing and is backfilled before export.
 */
export type ProviderRoleAssignment = Omit<RoleAssignmentRecord, 'roleDefinitionName'> & {
    readonly roleDefinitionName?: string;
};

export interface Principal {
    id: string;
    displayName: string;
    principalType: PrincipalType;
    signInName?: string;
}

export interface ResolvedPrincipal {
    readonly objectId: string;
    readonly objectType: PrincipalType;
}

export interface VerifiedDomain {
    name: string;
    isInitial: boolean;
}

export interface Subscription {
    subscriptionId: string;
    displayName: string;
    state?: string;
    tenantId?: string;
}

export interface RoleDefinition {
    id: string;
    name: string;
    isCustom: boolean;
    // Full definition as returned by the provider, kept for custom role export
    payload: Record<string, unknown>;
}

export interface CustomRoleDefinition {
    id: string;
    name: string;
    definition: Record<string, unknown>;
}

export interface GroupMembershipSnapshot {
    groupDisplayName: string;
    groupId: string;
    capturedAt: Date;
    members: Principal[];
}

export type Result<T, E> =
    | { ok: true; value: T }
    | { ok: false; error: E };

/**
 * Directory lookups (users, groups, domains) in the tenant a run is signed into.
 */
export interface DirectoryProvider {
    findGroupByDisplayName( name: string ): Promise<Principal[]>;
    findUserBySignInName( name: string ): Promise<Principal[]>;
    listGroupMembers( groupId: string ): Promise<Principal[]>;
    listVerifiedDomains(): Promise<VerifiedDomain[]>;
}

/**
 * Role assignment and role definition access, scoped to one subscription at a time.
 */
export interface AuthorizationProvider {
    listSubscriptions(): Promise<Subscription[]>;
    setActiveScope( subscriptionId: string ): Promise<void>;
    listRoleAssignments( includeClassicAdministrators: boolean ): Promise<ProviderRoleAssignment[]>;
    getRoleDefinition( id: string ): Promise<RoleDefinition>;
    listRoleDefinitions(): Promise<RoleDefinition[]>;
    createRoleAssignment( scope: string, objectId: string, roleDefinitionId: string ): Promise<CreateAssignmentResult>;
}

export type CreateAssignmentResult = Result<void, ProviderError>;

export function isPrincipalType( value: string ): value is PrincipalType {
    return ( PRINCIPAL_TYPES as readonly string[] ).includes( value );
}
