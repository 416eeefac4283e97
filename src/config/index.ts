// Configuration Management for rbac-migrate
import { config as dotenvxConfig } from '@dotenvx/dotenvx';
import { readFileSync, existsSync, mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';

export const USER_CONFIG_DIR_NAME = '.rbac-migrate';

export const LOG_LEVELS = [ 'debug', 'info', 'warn', 'error' ] as const;

export type LogLevel = typeof LOG_LEVELS[ number ];

export const SCOPE_REWRITE_MODES = [ 'preserve', 'target-subscription' ] as const;

export type ScopeRewriteMode = typeof SCOPE_REWRITE_MODES[ number ];

export interface AzureConfig {
    tenantId: string;
    clientId: string;
    clientSecret: string;
    authorityHost: string;
}

export interface LoggingConfig {
    level: LogLevel;
    file?: string;
    enableConsole: boolean;
}

export interface MigrationConfig {
    outputDirectory: string;
    concurrency: number;
    requestTimeoutMs: number;
    includeClassicAdministrators: boolean;
    scopeRewrite: ScopeRewriteMode;
}

export interface ToolConfig {
    azure: AzureConfig;
    logging: LoggingConfig;
    migration: MigrationConfig;
}

export interface ConfigValidationResult {
    isValid: boolean;
    errors: string[];
    warnings: string[];
}

type PartialToolConfig = {
    [ K in keyof ToolConfig ]?: Partial<ToolConfig[ K ]>;
};

function isLogLevel( value: string ): value is LogLevel {
    return ( LOG_LEVELS as readonly string[] ).includes( value );
}

function isScopeRewriteMode( value: string ): value is ScopeRewriteMode {
    return ( SCOPE_REWRITE_MODES as readonly string[] ).includes( value );
}

function isRecord( value: unknown ): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray( value );
}

/**
 * Configuration manager that supports multiple sources:
 * 1. Environment variables
 * 2. Configuration files (.env, config.json)
 * 3. Default values
 */
export class ConfigManager {
    private config: ToolConfig;
    private configSources: string[] = [];

    constructor( options: { skipEnvLoad?: boolean } = {} ) {
        this.config = this.loadConfiguration( options.skipEnvLoad );
    }

    /**
     * Load configuration from multiple sources in priority order:
     * 1. Environment variables (highest priority)
     * 2. Local config file (./config.json)
     * 3. User config file (~/.rbac-migrate/config.json)
     * 4. Default values (lowest priority)
     *
     * `skipEnvLoad` leaves out every file source, for isolated tests.
     */
    private loadConfiguration( skipEnvLoad = false ): ToolConfig {
        if ( !skipEnvLoad ) {
            this.loadEnvironmentFiles();
        }

        let config = this.getDefaultConfig();
        this.configSources.push( 'defaults' );

        const userConfigPath = join( homedir(), USER_CONFIG_DIR_NAME, 'config.json' );
        if ( !skipEnvLoad && existsSync( userConfigPath ) ) {
            config = this.mergeConfigFile( config, userConfigPath, 'user config' );
        }

        const localConfigPath = join( process.cwd(), 'config.json' );
        if ( !skipEnvLoad && existsSync( localConfigPath ) ) {
            config = this.mergeConfigFile( config, localConfigPath, 'local config' );
        }

        config = this.applyEnvironmentVariables( config );
        this.configSources.push( 'environment variables' );

        return config;
    }

    private mergeConfigFile( config: ToolConfig, filePath: string, label: string ): ToolConfig {
        try {
            const parsed: unknown = JSON.parse( readFileSync( filePath, 'utf-8' ) );
            if ( !isRecord( parsed ) ) {
                console.warn( `Warning: Ignoring ${label} at ${filePath}: expected a JSON object` );
                return config;
            }
            this.configSources.push( `${label} (${filePath})` );
            return this.mergeConfigs( config, this.toPartialConfig( parsed ) );
        } catch ( error ) {
            console.warn( `Warning: Failed to load ${label} from ${filePath}: ${error instanceof Error ? error.message : 'Unknown error'}` );
            return config;
        }
    }

    /**
     * Load environment files from multiple locations in priority order:
     * 1. User home directory (~/.rbac-migrate/.env)
     * 2. Current working directory (.env files)
     * 3. System environment variables
     *
     * Supports encrypted .env files via dotenvx
     */
    private loadEnvironmentFiles(): void {
        const envPaths = [
            join( homedir(), USER_CONFIG_DIR_NAME, '.env' ),
            join( process.cwd(), '.env' ),
            join( process.cwd(), '.env.local' )
        ];

        // Later files override earlier ones
        for ( const envPath of envPaths ) {
            if ( !existsSync( envPath ) ) {
                continue;
            }
            try {
                dotenvxConfig( {
                    path: envPath,
                    override: true
                } );
                this.configSources.push( `env file (${envPath})` );

                if ( readFileSync( envPath, 'utf-8' ).includes( 'DOTENV_PUBLIC_KEY' ) ) {
                    this.configSources.push( `encrypted env file (${envPath})` );
                }
            } catch ( error ) {
                console.warn( `Warning: Failed to load environment file ${envPath}: ${error instanceof Error ? error.message : 'Unknown error'}` );
            }
        }
    }

    private getDefaultConfig(): ToolConfig {
        return {
            azure: {
                tenantId: '',
                clientId: '',
                clientSecret: '',
                authorityHost: 'https://login.microsoftonline.com'
            },
            logging: {
                level: 'info',
                enableConsole: true
            },
            migration: {
                outputDirectory: join( process.cwd(), 'rbac-export' ),
                concurrency: 1,
                requestTimeoutMs: 60000,
                includeClassicAdministrators: true,
                scopeRewrite: 'preserve'
            }
        };
    }

    private applyEnvironmentVariables( config: ToolConfig ): ToolConfig {
        const env = process.env;

        if ( env.AZURE_TENANT_ID ) config.azure.tenantId = env.AZURE_TENANT_ID;
        if ( env.AZURE_CLIENT_ID ) config.azure.clientId = env.AZURE_CLIENT_ID;
        if ( env.AZURE_CLIENT_SECRET ) config.azure.clientSecret = env.AZURE_CLIENT_SECRET;
        if ( env.AZURE_AUTHORITY_HOST ) config.azure.authorityHost = env.AZURE_AUTHORITY_HOST;

        if ( env.LOG_LEVEL && isLogLevel( env.LOG_LEVEL ) ) {
            config.logging.level = env.LOG_LEVEL;
        }
        if ( env.LOG_FILE ) config.logging.file = env.LOG_FILE;
        if ( env.LOG_CONSOLE ) config.logging.enableConsole = env.LOG_CONSOLE.toLowerCase() === 'true';

        if ( env.RBAC_OUTPUT_DIR ) config.migration.outputDirectory = env.RBAC_OUTPUT_DIR;
        if ( env.RBAC_CONCURRENCY ) {
            const concurrency = parseInt( env.RBAC_CONCURRENCY, 10 );
            if ( !isNaN( concurrency ) && concurrency > 0 ) {
                config.migration.concurrency = concurrency;
            }
        }
        if ( env.RBAC_REQUEST_TIMEOUT_MS ) {
            const timeout = parseInt( env.RBAC_REQUEST_TIMEOUT_MS, 10 );
            if ( !isNaN( timeout ) && timeout > 0 ) {
                config.migration.requestTimeoutMs = timeout;
            }
        }
        if ( env.RBAC_INCLUDE_CLASSIC_ADMINS ) {
            config.migration.includeClassicAdministrators = env.RBAC_INCLUDE_CLASSIC_ADMINS.toLowerCase() === 'true';
        }
        if ( env.RBAC_SCOPE_REWRITE && isScopeRewriteMode( env.RBAC_SCOPE_REWRITE ) ) {
            config.migration.scopeRewrite = env.RBAC_SCOPE_REWRITE;
        }

        return config;
    }

    /**
     * Pick the known, correctly typed keys out of a parsed config file
     */
    private toPartialConfig( raw: Record<string, unknown> ): PartialToolConfig {
        const partial: PartialToolConfig = {};

        if ( isRecord( raw.azure ) ) {
            const azure: Partial<AzureConfig> = {};
            for ( const key of [ 'tenantId', 'clientId', 'clientSecret', 'authorityHost' ] as const ) {
                const value = raw.azure[ key ];
                if ( typeof value === 'string' ) azure[ key ] = value;
            }
            partial.azure = azure;
        }

        if ( isRecord( raw.logging ) ) {
            const logging: Partial<LoggingConfig> = {};
            const { level, file, enableConsole } = raw.logging;
            if ( typeof level === 'string' && isLogLevel( level ) ) logging.level = level;
            if ( typeof file === 'string' ) logging.file = file;
            if ( typeof enableConsole === 'boolean' ) logging.enableConsole = enableConsole;
            partial.logging = logging;
        }

        if ( isRecord( raw.migration ) ) {
            const migration: Partial<MigrationConfig> = {};
            const { outputDirectory, concurrency, requestTimeoutMs, includeClassicAdministrators, scopeRewrite } = raw.migration;
            if ( typeof outputDirectory === 'string' ) migration.outputDirectory = outputDirectory;
            if ( typeof concurrency === 'number' ) migration.concurrency = concurrency;
            if ( typeof requestTimeoutMs === 'number' ) migration.requestTimeoutMs = requestTimeoutMs;
            if ( typeof includeClassicAdministrators === 'boolean' ) migration.includeClassicAdministrators = includeClassicAdministrators;
            if ( typeof scopeRewrite === 'string' && isScopeRewriteMode( scopeRewrite ) ) migration.scopeRewrite = scopeRewrite;
            partial.migration = migration;
        }

        return partial;
    }

    /**
     * Merge two configuration objects, with the second taking priority
     */
    private mergeConfigs( base: ToolConfig, override: PartialToolConfig ): ToolConfig {
        return {
            azure: { ...base.azure, ...override.azure },
            logging: { ...base.logging, ...override.logging },
            migration: { ...base.migration, ...override.migration }
        };
    }

    getConfig(): ToolConfig {
        return {
            azure: { ...this.config.azure },
            logging: { ...this.config.logging },
            migration: { ...this.config.migration }
        };
    }

    getAzureConfig(): AzureConfig {
        return { ...this.config.azure };
    }

    getLoggingConfig(): LoggingConfig {
        return { ...this.config.logging };
    }

    getMigrationConfig(): MigrationConfig {
        return { ...this.config.migration };
    }

    /**
     * Validate the current configuration
     */
    validateConfig(): ConfigValidationResult {
        const errors: string[] = [];
        const warnings: string[] = [];

        if ( !this.config.azure.tenantId ) {
            errors.push( 'Azure Tenant ID is required (AZURE_TENANT_ID)' );
        }
        if ( !this.config.azure.clientId ) {
            errors.push( 'Azure Client ID is required (AZURE_CLIENT_ID)' );
        }
        if ( !this.config.azure.clientSecret ) {
            errors.push( 'Azure Client Secret is required (AZURE_CLIENT_SECRET)' );
        }
        if ( !/^https:\/\//.test( this.config.azure.authorityHost ) ) {
            errors.push( `Azure authority host must be an https URL: ${this.config.azure.authorityHost}` );
        }

        if ( !Number.isInteger( this.config.migration.concurrency ) || this.config.migration.concurrency < 1 ) {
            errors.push( 'Migration concurrency must be a positive integer (RBAC_CONCURRENCY)' );
        } else if ( this.config.migration.concurrency > 16 ) {
            warnings.push( `Migration concurrency of ${this.config.migration.concurrency} may trigger Azure API throttling` );
        }
        if ( this.config.migration.requestTimeoutMs < 1000 ) {
            errors.push( 'Request timeout must be at least 1000ms (RBAC_REQUEST_TIMEOUT_MS)' );
        }
        if ( !this.config.migration.outputDirectory ) {
            errors.push( 'Output directory is required (RBAC_OUTPUT_DIR)' );
        }
        if ( !isScopeRewriteMode( this.config.migration.scopeRewrite ) ) {
            errors.push( `Scope rewrite mode must be one of: ${SCOPE_REWRITE_MODES.join( ', ' )}` );
        }

        if ( this.config.logging.file && !this.config.logging.enableConsole ) {
            warnings.push( 'Console logging is disabled but file logging is enabled' );
        }

        return {
            isValid: errors.length === 0,
            errors,
            warnings
        };
    }

    getConfigSources(): string[] {
        return [ ...this.configSources ];
    }

    createConfigTemplate(): string {
        const template = {
            azure: {
                tenantId: "your-azure-tenant-id",
                clientId: "your-azure-client-id",
                clientSecret: "your-azure-client-secret",
                authorityHost: "https://login.microsoftonline.com"
            },
            logging: {
                level: "info",
                enableConsole: true,
                file: "rbac-migrate.log"
            },
            migration: {
                outputDirectory: "./rbac-export",
                concurrency: 1,
                requestTimeoutMs: 60000,
                includeClassicAdministrators: true,
                scopeRewrite: "preserve"
            }
        };

        return JSON.stringify( template, null, 2 );
    }

    createEnvTemplate(): string {
        return `# Azure AD / Entra ID app registration
AZURE_TENANT_ID=your-azure-tenant-id
AZURE_CLIENT_ID=your-azure-client-id
AZURE_CLIENT_SECRET=your-azure-client-secret
AZURE_AUTHORITY_HOST=https://login.microsoftonline.com

# Logging Configuration (Optional)
LOG_LEVEL=info
LOG_FILE=rbac-migrate.log
LOG_CONSOLE=true

# Migration Configuration (Optional)
RBAC_OUTPUT_DIR=./rbac-export
RBAC_CONCURRENCY=1
RBAC_REQUEST_TIMEOUT_MS=60000
RBAC_INCLUDE_CLASSIC_ADMINS=true
RBAC_SCOPE_REWRITE=preserve
`;
    }

    /**
     * Get masked configuration for safe logging/display
     */
    getMaskedConfig(): ToolConfig {
        const masked = this.getConfig();

        if ( masked.azure.clientSecret ) {
            masked.azure.clientSecret = '***masked***';
        }

        return masked;
    }

    /**
     * Setup user configuration directory and files
     */
    setupUserConfig(): { success: boolean; message: string; paths: string[] } {
        const userConfigDir = join( homedir(), USER_CONFIG_DIR_NAME );
        const userConfigFile = join( userConfigDir, 'config.json' );
        const userEnvFile = join( userConfigDir, '.env' );
        const createdPaths: string[] = [];

        try {
            if ( !existsSync( userConfigDir ) ) {
                mkdirSync( userConfigDir, { recursive: true } );
                createdPaths.push( userConfigDir );
            }

            if ( !existsSync( userConfigFile ) ) {
                writeFileSync( userConfigFile, this.createConfigTemplate() );
                createdPaths.push( userConfigFile );
            }

            if ( !existsSync( userEnvFile ) ) {
                writeFileSync( userEnvFile, this.createEnvTemplate() );
                createdPaths.push( userEnvFile );
            }

            return {
                success: true,
                message: `User configuration directory setup complete at ${userConfigDir}`,
                paths: createdPaths
            };
        } catch ( error ) {
            return {
                success: false,
                message: `Failed to setup user configuration: ${error instanceof Error ? error.message : 'Unknown error'}`,
                paths: createdPaths
            };
        }
    }
}

let sharedConfigManager: ConfigManager | undefined;

/**
 * Process-wide configuration, loaded on first use
 */
export function getConfigManager(): ConfigManager {
    if ( !sharedConfigManager ) {
        sharedConfigManager = new ConfigManager();
    }
    return sharedConfigManager;
}

export const getConfig = () => getConfigManager().getConfig();
export const getAzureConfig = () => getConfigManager().getAzureConfig();
export const getLoggingConfig = () => getConfigManager().getLoggingConfig();
export const getMigrationConfig = () => getConfigManager().getMigrationConfig();
export const validateConfig = () => getConfigManager().validateConfig();
