// Role Assignment Reconciler - replays exported assignments into a target subscription
import { AuthorizationProvider, CreateAssignmentResult, ResolvedPrincipal, RoleAssignmentRecord } from '../types';
import { AuthenticationError, ErrorHandler, ProviderError, ResolveError } from '../errors';
import { PrincipalResolver, ResolveResult, resolveRoleTarget, RoleTarget } from '../resolver';
import { mapWithConcurrency, withTimeout } from '../concurrency';
import { ScopeRewriteMode } from '../config';
import { Logger, silentLogger } from '../logging';

/** Directory-root scope; assignments there cannot be re-created inside a subscription */
export const ROOT_SCOPE = '/';

export type SkipReason = 'ScopeNotAssignable' | 'AlreadyAssigned' | 'DryRun' | 'Cancelled';

interface OutcomeBase {
    index: number;
    record: RoleAssignmentRecord;
}

export type ReconcileOutcome =
    | OutcomeBase & { status: 'Assigned'; principal: ResolvedPrincipal; target: RoleTarget }
    | OutcomeBase & { status: 'Skipped'; reason: SkipReason; principal?: ResolvedPrincipal; target?: RoleTarget }
    | OutcomeBase & { status: 'Failed'; error: ResolveError | ProviderError; target?: RoleTarget };

export interface ReconcileOptions {
    concurrency?: number;
    timeoutMs?: number;
    signal?: AbortSignal;
    dryRun?: boolean;
    scopeRewrite?: ScopeRewriteMode;
    onOutcome?: ( outcome: ReconcileOutcome ) => void;
}

/**
 * Point a `/subscriptions/{id}...` scope at another subscription; other scopes are returned unchanged.
 */
export function rewriteSubscriptionScope( scope: string, targetSubscriptionId: string ): string {
    return scope.replace( /^\/subscriptions\/[^/]+/i, `/subscriptions/${targetSubscriptionId}` );
}

export class RoleAssignmentReconciler {
    private resolver: PrincipalResolver;
    private authorization: AuthorizationProvider;
    private logger: Logger;

    constructor( resolver: PrincipalResolver, authorization: AuthorizationProvider, logger: Logger = silentLogger ) {
        this.resolver = resolver;
        this.authorization = authorization;
        this.logger = logger;
    }

    /**
     * Re-create each record's assignment in the target subscription.
     *
     * Records are independent: a failure only affects its own outcome, and
     * outcomes come back in input order. An AuthenticationError aborts the
     * batch once in-flight records settle. Nothing already created is rolled back.
     */
    async reconcile(
        records: readonly RoleAssignmentRecord[],
        targetSubscriptionId: string,
        options: ReconcileOptions = {}
    ): Promise<ReconcileOutcome[]> {
        this.logger.info( `Reconciling ${records.length} role assignments into subscription ${targetSubscriptionId}` );

        const results = await mapWithConcurrency(
            records,
            options.concurrency ?? 1,
            async ( record, index ) => {
                const outcome = await this.reconcileRecord( record, index, targetSubscriptionId, options );
                this.logOutcome( outcome );
                options.onOutcome?.( outcome );
                return outcome;
            },
            () => options.signal?.aborted === true
        );

        return results.map( ( outcome, index ): ReconcileOutcome => {
            if ( outcome ) {
                return outcome;
            }
            const cancelled: ReconcileOutcome = { index, record: records[ index ], status: 'Skipped', reason: 'Cancelled' };
            options.onOutcome?.( cancelled );
            return cancelled;
        } );
    }

    private async reconcileRecord(
        record: RoleAssignmentRecord,
        index: number,
        targetSubscriptionId: string,
        options: ReconcileOptions
    ): Promise<ReconcileOutcome> {
        if ( record.scope === ROOT_SCOPE ) {
            return { index, record, status: 'Skipped', reason: 'ScopeNotAssignable' };
        }

        const target = this.targetFor( record, targetSubscriptionId, options.scopeRewrite );

        let resolution: ResolveResult;
        try {
            resolution = await withTimeout( this.resolver.resolve( record ), options.timeoutMs, `Resolving ${record.objectType} "${record.displayName}"` );
        } catch ( error ) {
            return { index, record, status: 'Failed', error: this.toRecordError( error ), target };
        }

        if ( !resolution.ok ) {
            return { index, record, status: 'Failed', error: resolution.error, target };
        }

        const principal = resolution.value;
        if ( options.dryRun ) {
            return { index, record, status: 'Skipped', reason: 'DryRun', principal, target };
        }

        let created: CreateAssignmentResult;
        try {
            created = await withTimeout(
                this.authorization.createRoleAssignment( target.scope, principal.objectId, target.roleDefinitionId ),
                options.timeoutMs,
                `Creating "${record.roleDefinitionName}" for "${record.displayName}"`
            );
        } catch ( error ) {
            return { index, record, status: 'Failed', error: this.toRecordError( error ), target };
        }

        if ( !created.ok ) {
            if ( created.error.code === 'RoleAssignmentExists' ) {
                return { index, record, status: 'Skipped', reason: 'AlreadyAssigned', principal, target };
            }
            return { index, record, status: 'Failed', error: created.error, target };
        }

        return { index, record, status: 'Assigned', principal, target };
    }

    private targetFor( record: RoleAssignmentRecord, targetSubscriptionId: string, scopeRewrite: ScopeRewriteMode = 'preserve' ): RoleTarget {
        const target = resolveRoleTarget( record, targetSubscriptionId );
        if ( scopeRewrite === 'target-subscription' ) {
            return { ...target, scope: rewriteSubscriptionScope( target.scope, targetSubscriptionId ) };
        }
        return target;
    }

    /**
     * Per-record errors are returned; authentication failures end the batch.
     */
    private toRecordError( error: unknown ): ProviderError {
        const converted = ErrorHandler.toProviderError( error );
        if ( converted instanceof AuthenticationError ) {
            throw converted;
        }
        return converted;
    }

    private logOutcome( outcome: ReconcileOutcome ): void {
        const label = `#${outcome.index + 1} ${outcome.record.objectType} "${outcome.record.displayName}" -> ${outcome.record.roleDefinitionName}`;
        switch ( outcome.status ) {
            case 'Assigned':
                this.logger.info( `Assigned ${label} at ${outcome.target.scope}` );
                break;
            case 'Skipped':
                this.logger.info( `Skipped ${label} (${outcome.reason})` );
                break;
            case 'Failed':
                if ( outcome.error instanceof ResolveError && outcome.error.reason === 'Unsupported' ) {
                    this.logger.warn( `Action required for ${label}: ${outcome.error.message}` );
                } else {
                    this.logger.warn( `Failed ${label}: ${outcome.error.getDisplayMessage()}` );
                }
                break;
        }
    }
}
