// In-memory directory and authorization providers for tests
import {
    AuthorizationProvider,
    CreateAssignmentResult,
    DirectoryProvider,
    Principal,
    ProviderRoleAssignment,
    RoleAssignmentRecord,
    RoleDefinition,
    Subscription,
    VerifiedDomain
} from '../types';
import { ProviderError } from '../errors';

export function makeRecord( overrides: Partial<RoleAssignmentRecord> = {} ): RoleAssignmentRecord {
    return {
        objectId: 'source-object-1',
        objectType: 'User',
        displayName: 'Jane Doe',
        signInName: 'jane@fabrikam.com',
        scope: '/subscriptions/source-sub',
        roleDefinitionId: 'acdd72a7-3385-48ef-bd42-f606fba81ae7',
        roleDefinitionName: 'Reader',
        ...overrides
    };
}

export class FakeDirectory implements DirectoryProvider {
    users: Principal[] = [];
    groups: Principal[] = [];
    members = new Map<string, Principal[]>();
    domains: VerifiedDomain[] = [
        { name: 'fabrikam.com', isInitial: false },
        { name: 'fabrikam.onmicrosoft.com', isInitial: true }
    ];
    failingGroups = new Map<string, Error>();
    calls: string[] = [];

    async findGroupByDisplayName( name: string ): Promise<Principal[]> {
        this.calls.push( `group:${name}` );
        return this.groups.filter( group => group.displayName === name );
    }

    async findUserBySignInName( name: string ): Promise<Principal[]> {
        this.calls.push( `user:${name}` );
        return this.users.filter( user => user.signInName?.toLowerCase() === name.toLowerCase() );
    }

    async listGroupMembers( groupId: string ): Promise<Principal[]> {
        this.calls.push( `members:${groupId}` );
        const failure = this.failingGroups.get( groupId );
        if ( failure ) {
            throw failure;
        }
        return this.members.get( groupId ) ?? [];
    }

    async listVerifiedDomains(): Promise<VerifiedDomain[]> {
        return this.domains;
    }
}

export interface CreatedAssignment {
    scope: string;
    objectId: string;
    roleDefinitionId: string;
}

export class FakeAuthorization implements AuthorizationProvider {
    subscriptions: Subscription[] = [];
    assignmentsBySubscription = new Map<string, ProviderRoleAssignment[]>();
    definitionsBySubscription = new Map<string, RoleDefinition[]>();
    failingSubscriptions = new Map<string, Error>();
    created: CreatedAssignment[] = [];
    createFailures = new Map<string, ProviderError>();
    activeScope?: string;
    roleDefinitionLookups: string[] = [];

    async listSubscriptions(): Promise<Subscription[]> {
        return this.subscriptions;
    }

    async setActiveScope( subscriptionId: string ): Promise<void> {
        const failure = this.failingSubscriptions.get( subscriptionId );
        if ( failure ) {
            throw failure;
        }
        this.activeScope = subscriptionId;
    }

    async listRoleAssignments( includeClassicAdministrators: boolean ): Promise<ProviderRoleAssignment[]> {
        const assignments = this.assignmentsBySubscription.get( this.requireScope() ) ?? [];
        return includeClassicAdministrators
            ? assignments
            : assignments.filter( assignment => assignment.roleDefinitionId !== '' );
    }

    async getRoleDefinition( id: string ): Promise<RoleDefinition> {
        this.roleDefinitionLookups.push( id );
        const definition = ( this.definitionsBySubscription.get( this.requireScope() ) ?? [] ).find( candidate => candidate.id === id );
        if ( !definition ) {
            throw new ProviderError( `Role definition ${id} not found`, 'RoleDefinitionDoesNotExist', 404 );
        }
        return definition;
    }

    async listRoleDefinitions(): Promise<RoleDefinition[]> {
        return this.definitionsBySubscription.get( this.requireScope() ) ?? [];
    }

    async createRoleAssignment( scope: string, objectId: string, roleDefinitionId: string ): Promise<CreateAssignmentResult> {
        const failure = this.createFailures.get( objectId );
        if ( failure ) {
            return { ok: false, error: failure };
        }
        const duplicate = this.created.some( existing =>
            existing.scope === scope && existing.objectId === objectId && existing.roleDefinitionId === roleDefinitionId
        );
        if ( duplicate ) {
            return { ok: false, error: new ProviderError( 'The role assignment already exists.', 'RoleAssignmentExists', 409 ) };
        }
        this.created.push( { scope, objectId, roleDefinitionId } );
        return { ok: true, value: undefined };
    }

    private requireScope(): string {
        if ( !this.activeScope ) {
            throw new ProviderError( 'No active subscription selected', 'NO_ACTIVE_SCOPE' );
        }
        return this.activeScope;
    }
}
