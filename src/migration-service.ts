// Migration Service - wires providers, collector, reconciler, storage and reporting into the two runs
import { v4 as uuidv4 } from 'uuid';
import { AuthorizationProvider, DirectoryProvider } from './types';
import { ExportCollector, ExportResult, ExportSink } from './collector';
import { RoleAssignmentReconciler, ReconcileOutcome } from './reconciler';
import { PrincipalResolver } from './resolver';
import { loadDirectoryDomains } from './identity';
import { ParseResult } from './interchange';
import { buildReconcileReport, ReconcileReport } from './reporter';
import { MigrationConfig, ScopeRewriteMode } from './config';
import { ValidationError } from './errors';
import { Logger, silentLogger } from './logging';

export interface Providers {
    directory: DirectoryProvider;
    authorization: AuthorizationProvider;
}

/**
 * Where exports go and where import input and reports come from
 */
export interface MigrationStore extends ExportSink {
    readRecords( file: string ): Promise<ParseResult>;
    writeReport( report: ReconcileReport ): Promise<string>;
}

export interface MigrationServiceConfig {
    // Called lazily so argument checks run before anything signs in
    providers: () => Providers;
    store: MigrationStore;
    migration: MigrationConfig;
    logger?: Logger;
}

export interface ExportRequest {
    includeClassicAdministrators?: boolean;
}

export interface ImportRequest {
    file?: string;
    subscriptionId?: string;
    concurrency?: number;
    timeoutMs?: number;
    dryRun?: boolean;
    scopeRewrite?: ScopeRewriteMode;
    signal?: AbortSignal;
    runId?: string;
}

export interface ImportRun {
    report: ReconcileReport;
    reportFile: string;
    outcomes: ReconcileOutcome[];
}

function isPositiveInteger( value: number ): boolean {
    return Number.isInteger( value ) && value > 0;
}

/**
 * Reject an import request before any file or provider is touched
 */
export function validateImportRequest( request: ImportRequest ): { file: string; subscriptionId: string } {
    const file = request.file?.trim() ?? '';
    const subscriptionId = request.subscriptionId?.trim() ?? '';

    if ( file.length === 0 ) {
        throw new ValidationError( 'An input file is required (--file)' );
    }
    if ( subscriptionId.length === 0 ) {
        throw new ValidationError( 'A target subscription id is required (--subscription)' );
    }
    if ( request.concurrency !== undefined && !isPositiveInteger( request.concurrency ) ) {
        throw new ValidationError( 'Concurrency must be a positive integer', { concurrency: request.concurrency } );
    }
    if ( request.timeoutMs !== undefined && !isPositiveInteger( request.timeoutMs ) ) {
        throw new ValidationError( 'Timeout must be a positive number of milliseconds', { timeoutMs: request.timeoutMs } );
    }

    return { file, subscriptionId };
}

export class MigrationService {
    private config: MigrationServiceConfig;
    private logger: Logger;

    constructor( config: MigrationServiceConfig ) {
        this.config = config;
        this.logger = config.logger ?? silentLogger;
    }

    /**
     * Collect every accessible subscription and write it to the store
     */
    async exportAssignments( request: ExportRequest = {} ): Promise<ExportResult> {
        const { directory, authorization } = this.config.providers();
        const collector = new ExportCollector( authorization, directory, {
            includeClassicAdministrators: request.includeClassicAdministrators ?? this.config.migration.includeClassicAdministrators,
            timeoutMs: this.config.migration.requestTimeoutMs,
            logger: this.logger
        } );

        return collector.collectTo( this.config.store );
    }

    /**
     * Replay an exported file into the target subscription and write the run's report
     */
    async importAssignments( request: ImportRequest ): Promise<ImportRun> {
        const { file, subscriptionId } = validateImportRequest( request );
        const parsed = await this.config.store.readRecords( file );
        for ( const rejected of parsed.rejected ) {
            this.logger.warn( `Skipping line ${rejected.line} of ${file}: ${rejected.reason}` );
        }

        const runId = request.runId ?? uuidv4();
        const startedAt = new Date();
        const dryRun = request.dryRun ?? false;
        this.logger.info( `Importing ${parsed.records.length} role assignment(s) into ${subscriptionId}${dryRun ? ' (dry run)' : ''}` );

        const { directory, authorization } = this.config.providers();
        const domains = await loadDirectoryDomains( directory );
        const resolver = new PrincipalResolver( directory, domains );
        const reconciler = new RoleAssignmentReconciler( resolver, authorization, this.logger );

        const outcomes = await reconciler.reconcile( parsed.records, subscriptionId, {
            concurrency: request.concurrency ?? this.config.migration.concurrency,
            timeoutMs: request.timeoutMs ?? this.config.migration.requestTimeoutMs,
            signal: request.signal,
            dryRun,
            scopeRewrite: request.scopeRewrite ?? this.config.migration.scopeRewrite
        } );

        const report = buildReconcileReport( outcomes, {
            runId,
            targetSubscriptionId: subscriptionId,
            sourceFile: file,
            dryRun,
            startedAt,
            finishedAt: new Date(),
            rejectedRows: parsed.rejected
        } );
        const reportFile = await this.config.store.writeReport( report );
        this.logger.info( `Import report written to ${reportFile}` );

        return { report, reportFile, outcomes };
    }
}
