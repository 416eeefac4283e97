// Example: exporting role assignments and replaying them with the library API
import {
    AzureConfig,
    createAzureProviders,
    createLogger,
    ExportStore,
    formatExportSummary,
    formatReconcileReport,
    buildExportSummary,
    MigrationService,
    MigrationConfig
} from '../src';

// Example configuration: one app registration per tenant
const sourceTenant: AzureConfig = {
    tenantId: 'source-tenant-id',
    clientId: 'source-client-id',
    clientSecret: 'source-client-secret',
    authorityHost: 'https://login.microsoftonline.com'
};

const targetTenant: AzureConfig = {
    tenantId: 'target-tenant-id',
    clientId: 'target-client-id',
    clientSecret: 'target-client-secret',
    authorityHost: 'https://login.microsoftonline.com'
};

const migration: MigrationConfig = {
    outputDirectory: './rbac-export',
    concurrency: 4,
    requestTimeoutMs: 30000,
    includeClassicAdministrators: true,
    scopeRewrite: 'target-subscription'
};

const logger = createLogger( { level: 'info', enableConsole: true } );

function serviceFor( azure: AzureConfig ): MigrationService {
    return new MigrationService( {
        providers: () => createAzureProviders( azure, logger ),
        store: new ExportStore( migration.outputDirectory, logger ),
        migration,
        logger
    } );
}

async function exportExample() {
    const result = await serviceFor( sourceTenant ).exportAssignments();
    console.log( formatExportSummary( buildExportSummary( result ) ) );
}

async function importExample() {
    // Try the run first, then replay for real
    const dryRun = await serviceFor( targetTenant ).importAssignments( {
        file: `${migration.outputDirectory}/RoleAssignments.csv`,
        subscriptionId: 'target-subscription-id',
        dryRun: true
    } );
    console.log( formatReconcileReport( dryRun.report ) );

    if ( dryRun.report.failures.length > 0 ) {
        console.log( 'Fix the failures above before importing.' );
        return;
    }

    const run = await serviceFor( targetTenant ).importAssignments( {
        file: `${migration.outputDirectory}/RoleAssignments.csv`,
        subscriptionId: 'target-subscription-id'
    } );
    console.log( formatReconcileReport( run.report ) );
}

async function main() {
    console.log( '=== Role Assignment Migration Examples ===\n' );

    console.log( '1. Export from the source tenant:' );
    await exportExample();

    console.log( '\n2. Import into the target tenant:' );
    await importExample();
}

// Uncomment to run examples
// main().catch(console.error);

export {
    exportExample,
    importExample,
    main
};
