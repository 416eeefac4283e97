#!/usr/bin/env node

import { Command } from 'commander';
import { getConfigManager, ToolConfig, validateConfig } from './config';
import { ErrorHandler } from './errors';
import { createLogger } from './logging';
import { createAzureProviders } from './clients';
import { ExportStore } from './storage/export-store';
import { MigrationService } from './migration-service';
import { buildExportSummary, formatExportSummary, formatReconcileReport } from './reporter';

interface ExportCommandOptions {
    output?: string;
    classicAdmins: boolean;
    format: string;
}

interface ImportCommandOptions {
    file?: string;
    subscription?: string;
    output?: string;
    concurrency?: number;
    timeout?: number;
    dryRun?: boolean;
    retargetScopes?: boolean;
    format: string;
}

interface ConfigCommandOptions {
    validate?: boolean;
    show?: boolean;
    sources?: boolean;
    template?: boolean;
    envTemplate?: boolean;
    setupGlobal?: boolean;
}

const program = new Command();

program
    .name( 'rbac-migrate' )
    .description( 'Export Azure role assignments and replay them into another subscription, re-resolving principals in the target directory' )
    .version( '1.0.0' );

// Configuration helper with comprehensive validation
function getConfig(): ToolConfig {
    const validation = validateConfig();

    if ( !validation.isValid ) {
        console.error( 'Configuration validation failed:' );
        validation.errors.forEach( error => {
            console.error( `  - ${error}` );
        } );

        if ( validation.warnings.length > 0 ) {
            console.warn( '\nWarnings:' );
            validation.warnings.forEach( warning => {
                console.warn( `  - ${warning}` );
            } );
        }

        console.error( '\nPlease check your environment variables or configuration files.' );
        console.error( 'Use "rbac-migrate config --template" to generate a configuration template.' );
        process.exit( 1 );
    }

    if ( validation.warnings.length > 0 ) {
        console.warn( 'Configuration warnings:' );
        validation.warnings.forEach( warning => {
            console.warn( `  - ${warning}` );
        } );
        console.warn( '' );
    }

    return getConfigManager().getConfig();
}

function createMigrationService( outputDirectory?: string ): MigrationService {
    const config = getConfig();
    const logger = createLogger( config.logging );

    return new MigrationService( {
        providers: () => createAzureProviders( config.azure, logger ),
        store: new ExportStore( outputDirectory ?? config.migration.outputDirectory, logger ),
        migration: config.migration,
        logger
    } );
}

// Commander hands option values over as strings; range checks happen in the service
function parseNumber( value: string ): number {
    return Number( value );
}

// config command - Configuration management
program
    .command( 'config' )
    .description( 'Configuration management' )
    .option( '--validate', 'Validate current configuration' )
    .option( '--show', 'Show current configuration (masked)' )
    .option( '--sources', 'Show configuration sources' )
    .option( '--template', 'Generate configuration template' )
    .option( '--env-template', 'Generate environment variables template' )
    .option( '--setup-global', 'Setup global user configuration directory and templates' )
    .action( async ( options: ConfigCommandOptions ) => {
        try {
            const configManager = getConfigManager();

            if ( options.setupGlobal ) {
                console.log( 'Setting up global user configuration...' );
                console.log( '=====================================' );

                const result = configManager.setupUserConfig();

                if ( result.success ) {
                    console.log( `✅ ${result.message}` );

                    if ( result.paths.length > 0 ) {
                        console.log( '\nCreated files:' );
                        result.paths.forEach( path => {
                            console.log( `  📁 ${path}` );
                        } );
                    }

                    console.log( '\n📝 Next steps:' );
                    console.log( '1. Edit ~/.rbac-migrate/.env with the service principal of the tenant you sign into' );
                    console.log( '2. Or edit ~/.rbac-migrate/config.json for JSON-based configuration' );
                    console.log( '3. Run "rbac-migrate config --validate" to verify your setup' );
                    console.log( '\n💡 The global configuration will be used when running rbac-migrate from any directory' );
                } else {
                    console.error( `❌ ${result.message}` );
                    process.exit( 1 );
                }
                return;
            }

            if ( options.template ) {
                console.log( 'Configuration template (config.json):' );
                console.log( '=====================================' );
                console.log( configManager.createConfigTemplate() );
                return;
            }

            if ( options.envTemplate ) {
                console.log( 'Environment variables template (.env):' );
                console.log( '=====================================' );
                console.log( configManager.createEnvTemplate() );
                return;
            }

            if ( options.sources ) {
                console.log( 'Configuration sources (in priority order):' );
                console.log( '=========================================' );
                configManager.getConfigSources().forEach( ( source, index ) => {
                    console.log( `${index + 1}. ${source}` );
                } );
                return;
            }

            if ( options.show ) {
                console.log( 'Current configuration (sensitive values masked):' );
                console.log( '===============================================' );
                console.log( JSON.stringify( configManager.getMaskedConfig(), null, 2 ) );
                return;
            }

            // Default: validate configuration
            const validation = configManager.validateConfig();

            console.log( 'Configuration Validation:' );
            console.log( '========================' );
            console.log( `Status: ${validation.isValid ? '✅ Valid' : '❌ Invalid'}` );

            if ( validation.errors.length > 0 ) {
                console.log( '\nErrors:' );
                validation.errors.forEach( error => {
                    console.log( `  ❌ ${error}` );
                } );
            }

            if ( validation.warnings.length > 0 ) {
                console.log( '\nWarnings:' );
                validation.warnings.forEach( warning => {
                    console.log( `  ⚠️  ${warning}` );
                } );
            }

            if ( validation.isValid ) {
                console.log( '\n✅ Configuration is valid and ready to use!' );
            } else {
                console.log( '\n❌ Please fix the configuration errors before using the tool.' );
                console.log( 'Use "rbac-migrate config --template" to generate a configuration template.' );
                process.exit( 1 );
            }

        } catch ( error ) {
            ErrorHandler.handleError( error, 'Configuration management' );
        }
    } );

// export command - Collect role assignments from every accessible subscription
program
    .command( 'export' )
    .description( 'Export role assignments, role definitions and group memberships from every accessible subscription' )
    .option( '-o, --output <dir>', 'Directory to write the export to' )
    .option( '--no-classic-admins', 'Leave classic co-administrators out of the export' )
    .option( '--format <format>', 'Output format (table|json)', 'table' )
    .action( async ( options: ExportCommandOptions ) => {
        try {
            const service = createMigrationService( options.output );
            const result = await service.exportAssignments( {
                // Only an explicit --no-classic-admins overrides the configured default
                includeClassicAdministrators: options.classicAdmins ? undefined : false
            } );
            const summary = buildExportSummary( result );

            if ( options.format === 'json' ) {
                console.log( JSON.stringify( summary, null, 2 ) );
            } else {
                console.log( formatExportSummary( summary ) );
            }

        } catch ( error ) {
            ErrorHandler.handleError( error, 'Exporting role assignments' );
        }
    } );

// import command - Replay an export into a target subscription
program
    .command( 'import' )
    .description( 'Re-create exported role assignments in a target subscription' )
    .option( '-f, --file <path>', 'Exported role assignments (.csv or .json)' )
    .option( '-s, --subscription <id>', 'Target subscription id' )
    .option( '-o, --output <dir>', 'Directory to write the import report to' )
    .option( '--concurrency <n>', 'Records reconciled in parallel', parseNumber )
    .option( '--timeout <ms>', 'Per-request timeout in milliseconds', parseNumber )
    .option( '--dry-run', 'Resolve principals without creating any assignment' )
    .option( '--retarget-scopes', 'Point every subscription scope at the target subscription' )
    .option( '--format <format>', 'Output format (table|json)', 'table' )
    .action( async ( options: ImportCommandOptions ) => {
        const controller = new AbortController();
        const onInterrupt = (): void => {
            console.warn( '\n⚠️  Interrupted: letting in-flight records finish, the rest are cancelled' );
            controller.abort();
        };
        process.once( 'SIGINT', onInterrupt );

        try {
            const service = createMigrationService( options.output );
            const run = await service.importAssignments( {
                file: options.file,
                subscriptionId: options.subscription,
                concurrency: options.concurrency,
                timeoutMs: options.timeout,
                dryRun: options.dryRun,
                scopeRewrite: options.retargetScopes ? 'target-subscription' : undefined,
                signal: controller.signal
            } );

            if ( options.format === 'json' ) {
                console.log( JSON.stringify( run.report, null, 2 ) );
            } else {
                console.log( formatReconcileReport( run.report ) );
                console.log( `📝 Report saved to ${run.reportFile}` );
            }

        } catch ( error ) {
            ErrorHandler.handleError( error, 'Importing role assignments' );
        } finally {
            process.off( 'SIGINT', onInterrupt );
        }
    } );

// Parse command line arguments when run as the binary
if ( require.main === module ) {
    program.parse();
}

export { program };
