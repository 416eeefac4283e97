// Export Collector - gathers role assignments, role definitions and group memberships per subscription
import {
    AuthorizationProvider,
    CustomRoleDefinition,
    DirectoryProvider,
    GroupMembershipSnapshot,
    ProviderRoleAssignment,
    RoleAssignmentRecord,
    RoleDefinition,
    Subscription
} from '../types';
import { AuthenticationError, ErrorHandler, MigrationError } from '../errors';
import { withTimeout } from '../concurrency';
import { Logger, silentLogger } from '../logging';

/** Pseudo-subscription the directory exposes for itself; it holds no assignable scopes */
export const DIRECTORY_PSEUDO_SUBSCRIPTION = 'Access to Azure Active Directory';

export interface ScopeExport {
    subscription: Subscription;
    assignments: RoleAssignmentRecord[];
}

export interface ScopeFailure {
    subscriptionId: string;
    displayName: string;
    error: MigrationError;
}

/**
 * One assignment or group that could not be completed; the rest of its scope is still exported
 */
export interface ItemFailure {
    subscriptionId: string;
    subject: string;
    error: MigrationError;
}

export interface ExportResult {
    scopes: ScopeExport[];
    assignments: RoleAssignmentRecord[];
    roleDefinitions: RoleDefinition[];
    customRoleDefinitions: CustomRoleDefinition[];
    groupSnapshots: GroupMembershipSnapshot[];
    failures: ScopeFailure[];
    itemFailures: ItemFailure[];
}

/**
 * Destination for a finished export, e.g. a directory of CSV and JSON files
 */
export interface ExportSink {
    write( result: ExportResult ): Promise<void>;
}

export interface ExportCollectorOptions {
    includeClassicAdministrators?: boolean;
    timeoutMs?: number;
    logger?: Logger;
}

export class ExportCollector {
    private authorization: AuthorizationProvider;
    private directory: DirectoryProvider;
    private includeClassicAdministrators: boolean;
    private timeoutMs?: number;
    private logger: Logger;

    constructor( authorization: AuthorizationProvider, directory: DirectoryProvider, options: ExportCollectorOptions = {} ) {
        this.authorization = authorization;
        this.directory = directory;
        this.includeClassicAdministrators = options.includeClassicAdministrators ?? true;
        this.timeoutMs = options.timeoutMs;
        this.logger = options.logger ?? silentLogger;
    }

    /**
     * Collect every accessible subscription. A scope that fails is recorded in
     * `failures` and skipped; only authentication failures end the run.
     */
    async collect(): Promise<ExportResult> {
        const subscriptions = await this.call( this.authorization.listSubscriptions(), 'Listing subscriptions' );
        const result: ExportResult = {
            scopes: [],
            assignments: [],
            roleDefinitions: [],
            customRoleDefinitions: [],
            groupSnapshots: [],
            failures: [],
            itemFailures: []
        };

        // Shared across scopes so each group is captured once per run
        const snapshots = new Map<string, Promise<GroupMembershipSnapshot>>();
        const definitionIds = new Set<string>();
        const customRoleNames = new Set<string>();

        // One scope at a time: the provider keeps a single active subscription
        for ( const subscription of subscriptions ) {
            if ( subscription.displayName === DIRECTORY_PSEUDO_SUBSCRIPTION ) {
                this.logger.debug( `Skipping ${DIRECTORY_PSEUDO_SUBSCRIPTION}` );
                continue;
            }

            this.logger.info( `Exporting role assignments from ${subscription.displayName} (${subscription.subscriptionId})` );

            try {
                const scope = await this.collectScope( subscription, snapshots );
                result.scopes.push( { subscription, assignments: scope.assignments } );
                result.assignments.push( ...scope.assignments );
                result.itemFailures.push( ...scope.itemFailures );

                for ( const definition of scope.definitions ) {
                    if ( !definitionIds.has( definition.id ) ) {
                        definitionIds.add( definition.id );
                        result.roleDefinitions.push( definition );
                    }
                    if ( definition.isCustom && !customRoleNames.has( definition.name ) ) {
                        customRoleNames.add( definition.name );
                        result.customRoleDefinitions.push( { id: definition.id, name: definition.name, definition: definition.payload } );
                    }
                }

                this.logger.info( `Exported ${scope.assignments.length} role assignments from ${subscription.displayName}` );
            } catch ( error ) {
                const normalized = ErrorHandler.normalize( error );
                if ( normalized instanceof AuthenticationError ) {
                    throw normalized;
                }
                this.logger.warn( `Skipping ${subscription.displayName}: ${normalized.getDisplayMessage()}` );
                result.failures.push( {
                    subscriptionId: subscription.subscriptionId,
                    displayName: subscription.displayName,
                    error: normalized
                } );
            }
        }

        // Snapshots are settled here: every entry was awaited inside its scope
        for ( const snapshot of snapshots.values() ) {
            result.groupSnapshots.push( await snapshot );
        }

        return result;
    }

    /**
     * Collect, then hand the result to `sink`
     */
    async collectTo( sink: ExportSink ): Promise<ExportResult> {
        const result = await this.collect();
        await sink.write( result );
        return result;
    }

    private async collectScope(
        subscription: Subscription,
        snapshots: Map<string, Promise<GroupMembershipSnapshot>>
    ): Promise<{ assignments: RoleAssignmentRecord[]; definitions: RoleDefinition[]; itemFailures: ItemFailure[] }> {
        await this.call( this.authorization.setActiveScope( subscription.subscriptionId ), `Selecting ${subscription.displayName}` );

        const raw = await this.call(
            this.authorization.listRoleAssignments( this.includeClassicAdministrators ),
            `Listing role assignments in ${subscription.displayName}`
        );

        const itemFailures: ItemFailure[] = [];
        const recordFailure = ( subject: string, error: unknown ): void => {
            const normalized = ErrorHandler.normalize( error );
            if ( normalized instanceof AuthenticationError ) {
                throw normalized;
            }
            this.logger.warn( `${subject} in ${subscription.displayName} failed: ${normalized.getDisplayMessage()}` );
            itemFailures.push( { subscriptionId: subscription.subscriptionId, subject, error: normalized } );
        };

        const roleNames = new Map<string, Promise<string>>();
        const assignments: RoleAssignmentRecord[] = [];
        for ( const assignment of raw ) {
            assignments.push( await this.withRoleName( assignment, roleNames, recordFailure ) );
        }

        const failedGroups = new Set<string>();
        for ( const assignment of assignments ) {
            if ( assignment.objectType !== 'Group' || failedGroups.has( assignment.displayName ) ) {
                continue;
            }
            // A group deleted from the directory keeps its assignments but has no name to snapshot under
            if ( !assignment.displayName ) {
                this.logger.warn( `Not capturing members of unresolved group ${assignment.objectId} in ${subscription.displayName}` );
                continue;
            }
            try {
                await this.captureGroup( assignment, snapshots );
            } catch ( error ) {
                failedGroups.add( assignment.displayName );
                recordFailure( `Capturing members of group "${assignment.displayName}"`, error );
            }
        }

        const definitions = await this.call(
            this.authorization.listRoleDefinitions(),
            `Listing role definitions in ${subscription.displayName}`
        );

        return { assignments, definitions, itemFailures };
    }

    private async withRoleName(
        assignment: ProviderRoleAssignment,
        roleNames: Map<string, Promise<string>>,
        recordFailure: ( subject: string, error: unknown ) => void
    ): Promise<RoleAssignmentRecord> {
        if ( assignment.roleDefinitionName ) {
            return { ...assignment, roleDefinitionName: assignment.roleDefinitionName };
        }

        let name = roleNames.get( assignment.roleDefinitionId );
        if ( !name ) {
            name = this.call(
                this.authorization.getRoleDefinition( assignment.roleDefinitionId ),
                `Looking up role definition ${assignment.roleDefinitionId}`
            ).then(
                definition => definition.name,
                // The assignment is kept under its definition id with no name
                ( error: unknown ) => {
                    recordFailure( `Looking up role definition ${assignment.roleDefinitionId}`, error );
                    return '';
                }
            );
            roleNames.set( assignment.roleDefinitionId, name );
        }

        return { ...assignment, roleDefinitionName: await name };
    }

    private async captureGroup(
        assignment: RoleAssignmentRecord,
        snapshots: Map<string, Promise<GroupMembershipSnapshot>>
    ): Promise<void> {
        const existing = snapshots.get( assignment.displayName );
        if ( existing ) {
            await existing;
            return;
        }

        const pending = this.call(
            this.directory.listGroupMembers( assignment.objectId ),
            `Listing members of ${assignment.displayName}`
        ).then( ( members ): GroupMembershipSnapshot => ( {
            groupDisplayName: assignment.displayName,
            groupId: assignment.objectId,
            capturedAt: new Date(),
            members
        } ) );
        snapshots.set( assignment.displayName, pending );

        try {
            await pending;
            this.logger.debug( `Captured membership of group ${assignment.displayName}` );
        } catch ( error ) {
            // A later scope may try this group again
            snapshots.delete( assignment.displayName );
            throw error;
        }
    }

    private call<T>( promise: Promise<T>, label: string ): Promise<T> {
        return withTimeout( promise, this.timeoutMs, label );
    }
}
