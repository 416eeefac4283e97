// Tests for Configuration Management
import { ConfigManager } from './index';

// Store original environment to restore after tests
const originalEnv = { ...process.env };

const MANAGED_KEYS = [
    'AZURE_TENANT_ID',
    'AZURE_CLIENT_ID',
    'AZURE_CLIENT_SECRET',
    'AZURE_AUTHORITY_HOST',
    'LOG_LEVEL',
    'LOG_FILE',
    'LOG_CONSOLE',
    'RBAC_OUTPUT_DIR',
    'RBAC_CONCURRENCY',
    'RBAC_REQUEST_TIMEOUT_MS',
    'RBAC_INCLUDE_CLASSIC_ADMINS',
    'RBAC_SCOPE_REWRITE'
];

function restoreEnvironment(): void {
    Object.keys( process.env ).forEach( key => {
        if ( !Object.prototype.hasOwnProperty.call( originalEnv, key ) ) {
            delete process.env[ key ];
        }
    } );
    Object.assign( process.env, originalEnv );
}

describe( 'ConfigManager', () => {
    let configManager: ConfigManager;

    beforeEach( () => {
        restoreEnvironment();
        MANAGED_KEYS.forEach( key => delete process.env[ key ] );
        configManager = new ConfigManager( { skipEnvLoad: true } );
    } );

    afterEach( () => {
        restoreEnvironment();
    } );

    describe( 'validateConfig', () => {
        test( 'should return invalid when required Azure config is missing', () => {
            const validation = configManager.validateConfig();

            expect( validation.isValid ).toBe( false );
            expect( validation.errors ).toContain( 'Azure Tenant ID is required (AZURE_TENANT_ID)' );
            expect( validation.errors ).toContain( 'Azure Client ID is required (AZURE_CLIENT_ID)' );
            expect( validation.errors ).toContain( 'Azure Client Secret is required (AZURE_CLIENT_SECRET)' );
        } );

        test( 'should return valid when all required config is provided', () => {
            process.env.AZURE_TENANT_ID = 'test-tenant';
            process.env.AZURE_CLIENT_ID = 'test-client';
            process.env.AZURE_CLIENT_SECRET = 'test-secret';

            configManager = new ConfigManager( { skipEnvLoad: true } );
            const validation = configManager.validateConfig();

            expect( validation.isValid ).toBe( true );
            expect( validation.errors ).toHaveLength( 0 );
        } );

        test( 'should reject a non-https authority host', () => {
            process.env.AZURE_TENANT_ID = 'test-tenant';
            process.env.AZURE_CLIENT_ID = 'test-client';
            process.env.AZURE_CLIENT_SECRET = 'test-secret';
            process.env.AZURE_AUTHORITY_HOST = 'http://login.example.test';

            configManager = new ConfigManager( { skipEnvLoad: true } );
            const validation = configManager.validateConfig();

            expect( validation.errors ).toEqual( [
                'Azure authority host must be an https URL: http://login.example.test'
            ] );
        } );

        test( 'should warn about high concurrency', () => {
            process.env.AZURE_TENANT_ID = 'test-tenant';
            process.env.AZURE_CLIENT_ID = 'test-client';
            process.env.AZURE_CLIENT_SECRET = 'test-secret';
            process.env.RBAC_CONCURRENCY = '32';

            configManager = new ConfigManager( { skipEnvLoad: true } );
            const validation = configManager.validateConfig();

            expect( validation.isValid ).toBe( true );
            expect( validation.warnings ).toEqual( [
                'Migration concurrency of 32 may trigger Azure API throttling'
            ] );
        } );
    } );

    describe( 'environment variables', () => {
        test( 'should use defaults when nothing is set', () => {
            const migration = configManager.getMigrationConfig();

            expect( migration.concurrency ).toBe( 1 );
            expect( migration.requestTimeoutMs ).toBe( 60000 );
            expect( migration.includeClassicAdministrators ).toBe( true );
            expect( migration.scopeRewrite ).toBe( 'preserve' );
            expect( configManager.getLoggingConfig().level ).toBe( 'info' );
        } );

        test( 'should apply migration settings', () => {
            process.env.RBAC_OUTPUT_DIR = '/tmp/rbac-out';
            process.env.RBAC_CONCURRENCY = '4';
            process.env.RBAC_REQUEST_TIMEOUT_MS = '5000';
            process.env.RBAC_INCLUDE_CLASSIC_ADMINS = 'FALSE';
            process.env.RBAC_SCOPE_REWRITE = 'target-subscription';

            configManager = new ConfigManager( { skipEnvLoad: true } );

            expect( configManager.getMigrationConfig() ).toEqual( {
                outputDirectory: '/tmp/rbac-out',
                concurrency: 4,
                requestTimeoutMs: 5000,
                includeClassicAdministrators: false,
                scopeRewrite: 'target-subscription'
            } );
        } );

        test( 'should ignore invalid numbers and unknown modes', () => {
            process.env.RBAC_CONCURRENCY = 'many';
            process.env.RBAC_REQUEST_TIMEOUT_MS = '-5';
            process.env.RBAC_SCOPE_REWRITE = 'everything';
            process.env.LOG_LEVEL = 'verbose';

            configManager = new ConfigManager( { skipEnvLoad: true } );

            expect( configManager.getMigrationConfig().concurrency ).toBe( 1 );
            expect( configManager.getMigrationConfig().requestTimeoutMs ).toBe( 60000 );
            expect( configManager.getMigrationConfig().scopeRewrite ).toBe( 'preserve' );
            expect( configManager.getLoggingConfig().level ).toBe( 'info' );
        } );
    } );

    describe( 'createConfigTemplate', () => {
        test( 'should create valid JSON template', () => {
            const template = configManager.createConfigTemplate();

            expect( () => JSON.parse( template ) ).not.toThrow();

            const parsed = JSON.parse( template );
            expect( parsed ).toHaveProperty( 'azure' );
            expect( parsed ).toHaveProperty( 'logging' );
            expect( parsed ).toHaveProperty( 'migration' );
            expect( parsed.migration.scopeRewrite ).toBe( 'preserve' );
        } );
    } );

    describe( 'createEnvTemplate', () => {
        test( 'should create environment variables template', () => {
            const template = configManager.createEnvTemplate();

            expect( template ).toContain( 'AZURE_TENANT_ID=' );
            expect( template ).toContain( 'AZURE_CLIENT_ID=' );
            expect( template ).toContain( 'RBAC_OUTPUT_DIR=' );
            expect( template ).toContain( 'RBAC_SCOPE_REWRITE=' );
        } );
    } );

    describe( 'getMaskedConfig', () => {
        test( 'should mask sensitive values', () => {
            process.env.AZURE_CLIENT_SECRET = 'test-secret';

            configManager = new ConfigManager( { skipEnvLoad: true } );
            const masked = configManager.getMaskedConfig();

            expect( masked.azure.clientSecret ).toBe( '***masked***' );
            expect( configManager.getAzureConfig().clientSecret ).toBe( 'test-secret' );
        } );
    } );
} );
