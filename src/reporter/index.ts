// Migration Reporter - import outcome reports and export summaries
import { ReconcileOutcome, SkipReason } from '../reconciler';
import { ExportResult } from '../collector';
import { RejectedRow } from '../interchange';
import { ResolveError } from '../errors';

export interface ReportEntry {
    // 1-based position of the record in the input file
    row: number;
    objectType: string;
    displayName: string;
    signInName: string | null;
    scope: string;
    roleDefinitionName: string;
    code?: string;
    message?: string;
}

export interface ReconcileReportMeta {
    runId: string;
    targetSubscriptionId: string;
    sourceFile?: string;
    dryRun?: boolean;
    startedAt: Date;
    finishedAt: Date;
    rejectedRows?: RejectedRow[];
}

export interface ReconcileReport {
    runId: string;
    targetSubscriptionId: string;
    sourceFile?: string;
    dryRun: boolean;
    startedAt: string;
    finishedAt: string;
    totals: {
        records: number;
        assigned: number;
        skipped: number;
        failed: number;
        // Unsupported principals; not counted as failed
        actionRequired: number;
    };
    skippedByReason: Record<SkipReason, number>;
    assigned: ReportEntry[];
    // Assignments the tool will not make and an operator has to
    actionItems: ReportEntry[];
    failures: ReportEntry[];
    skipped: ReportEntry[];
    rejectedRows: RejectedRow[];
}

export interface ExportSummary {
    scopes: number;
    assignments: number;
    assignmentsByType: Record<string, number>;
    roleDefinitions: number;
    customRoleDefinitions: number;
    groupSnapshots: number;
    failures: Array<{ subscriptionId: string; displayName: string; message: string }>;
    itemFailures: Array<{ subscriptionId: string; subject: string; message: string }>;
}

function toEntry( outcome: ReconcileOutcome ): ReportEntry {
    const { record } = outcome;
    const entry: ReportEntry = {
        row: outcome.index + 1,
        objectType: record.objectType,
        displayName: record.displayName,
        signInName: record.signInName,
        scope: outcome.target?.scope ?? record.scope,
        roleDefinitionName: record.roleDefinitionName
    };
    if ( outcome.status === 'Failed' ) {
        entry.code = outcome.error.code;
        entry.message = outcome.error.message;
    } else if ( outcome.status === 'Skipped' ) {
        entry.code = outcome.reason;
    }
    return entry;
}

function isActionItem( outcome: ReconcileOutcome ): boolean {
    return outcome.status === 'Failed' && outcome.error instanceof ResolveError && outcome.error.reason === 'Unsupported';
}

/**
 * Summarize reconcile outcomes, kept in input order
 */
export function buildReconcileReport( outcomes: readonly ReconcileOutcome[], meta: ReconcileReportMeta ): ReconcileReport {
    const report: ReconcileReport = {
        runId: meta.runId,
        targetSubscriptionId: meta.targetSubscriptionId,
        sourceFile: meta.sourceFile,
        dryRun: meta.dryRun ?? false,
        startedAt: meta.startedAt.toISOString(),
        finishedAt: meta.finishedAt.toISOString(),
        totals: { records: outcomes.length, assigned: 0, skipped: 0, failed: 0, actionRequired: 0 },
        skippedByReason: { ScopeNotAssignable: 0, AlreadyAssigned: 0, DryRun: 0, Cancelled: 0 },
        assigned: [],
        actionItems: [],
        failures: [],
        skipped: [],
        rejectedRows: meta.rejectedRows ?? []
    };

    for ( const outcome of outcomes ) {
        const entry = toEntry( outcome );
        switch ( outcome.status ) {
            case 'Assigned':
                report.totals.assigned++;
                report.assigned.push( entry );
                break;
            case 'Skipped':
                report.totals.skipped++;
                report.skippedByReason[ outcome.reason ]++;
                report.skipped.push( entry );
                break;
            case 'Failed':
                if ( isActionItem( outcome ) ) {
                    report.totals.actionRequired++;
                    report.actionItems.push( entry );
                } else {
                    report.totals.failed++;
                    report.failures.push( entry );
                }
                break;
        }
    }

    return report;
}

function describeEntry( entry: ReportEntry ): string {
    const who = entry.signInName ? `${entry.displayName} <${entry.signInName}>` : entry.displayName;
    return `#${entry.row} ${entry.objectType} ${who}: ${entry.roleDefinitionName} at ${entry.scope}`;
}

export function formatReconcileReport( report: ReconcileReport ): string {
    let text = `# Role Assignment Import Report${report.dryRun ? ' (dry run)' : ''}\n\n`;
    text += `Run: ${report.runId}\n`;
    text += `Target subscription: ${report.targetSubscriptionId}\n`;
    if ( report.sourceFile ) {
        text += `Source file: ${report.sourceFile}\n`;
    }
    text += `Started: ${report.startedAt}\n`;
    text += `Finished: ${report.finishedAt}\n\n`;

    text += '## Summary\n\n';
    text += `- Records: ${report.totals.records}\n`;
    text += `- Assigned: ${report.totals.assigned}\n`;
    text += `- Skipped: ${report.totals.skipped}\n`;
    for ( const [ reason, count ] of Object.entries( report.skippedByReason ) ) {
        if ( count > 0 ) {
            text += `  - ${reason}: ${count}\n`;
        }
    }
    text += `- Failed: ${report.totals.failed}\n`;
    text += `- Action required: ${report.totals.actionRequired}\n`;
    if ( report.rejectedRows.length > 0 ) {
        text += `- Rejected rows: ${report.rejectedRows.length}\n`;
    }
    text += '\n';

    if ( report.actionItems.length > 0 ) {
        text += '## Action Required\n\n';
        for ( const entry of report.actionItems ) {
            text += `- ${describeEntry( entry )}\n`;
        }
        text += '\n';
    }

    if ( report.failures.length > 0 ) {
        text += '## Failures\n\n';
        for ( const entry of report.failures ) {
            text += `- ${describeEntry( entry )} [${entry.code}] ${entry.message}\n`;
        }
        text += '\n';
    }

    if ( report.rejectedRows.length > 0 ) {
        text += '## Rejected Rows\n\n';
        for ( const row of report.rejectedRows ) {
            text += `- Line ${row.line}: ${row.reason}\n`;
        }
        text += '\n';
    }

    return text;
}

export function buildExportSummary( result: ExportResult ): ExportSummary {
    const assignmentsByType: Record<string, number> = {};
    for ( const assignment of result.assignments ) {
        assignmentsByType[ assignment.objectType ] = ( assignmentsByType[ assignment.objectType ] || 0 ) + 1;
    }

    return {
        scopes: result.scopes.length,
        assignments: result.assignments.length,
        assignmentsByType,
        roleDefinitions: result.roleDefinitions.length,
        customRoleDefinitions: result.customRoleDefinitions.length,
        groupSnapshots: result.groupSnapshots.length,
        failures: result.failures.map( failure => ( {
            subscriptionId: failure.subscriptionId,
            displayName: failure.displayName,
            message: failure.error.getDisplayMessage()
        } ) ),
        itemFailures: result.itemFailures.map( failure => ( {
            subscriptionId: failure.subscriptionId,
            subject: failure.subject,
            message: failure.error.getDisplayMessage()
        } ) )
    };
}

export function formatExportSummary( summary: ExportSummary ): string {
    let text = '# Role Assignment Export\n\n';
    text += `- Subscriptions exported: ${summary.scopes}\n`;
    text += `- Role assignments: ${summary.assignments}\n`;
    for ( const [ type, count ] of Object.entries( summary.assignmentsByType ) ) {
        text += `  - ${type}: ${count}\n`;
    }
    text += `- Role definitions: ${summary.roleDefinitions} (${summary.customRoleDefinitions} custom)\n`;
    text += `- Group membership snapshots: ${summary.groupSnapshots}\n`;

    if ( summary.failures.length > 0 ) {
        text += '\n## Skipped Subscriptions\n\n';
        for ( const failure of summary.failures ) {
            text += `- ${failure.displayName} (${failure.subscriptionId}): ${failure.message}\n`;
        }
    }

    if ( summary.itemFailures.length > 0 ) {
        text += '\n## Incomplete Items\n\n';
        for ( const failure of summary.itemFailures ) {
            text += `- ${failure.subject} (${failure.subscriptionId}): ${failure.message}\n`;
        }
    }

    return text;
}
