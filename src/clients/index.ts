// Azure provider wiring
import { AzureConfig } from '../config';
import { Logger } from '../logging';
import { ArmAuthorizationClient } from './arm-authorization-client';
import { TokenProvider } from './credentials';
import { createGraphApi, GraphDirectoryClient } from './graph-directory-client';

export * from './arm-authorization-client';
export * from './credentials';
export * from './graph-directory-client';

export interface AzureProviders {
    directory: GraphDirectoryClient;
    authorization: ArmAuthorizationClient;
}

/**
 * Build the Graph directory and ARM authorization clients for one signed-in tenant
 */
export function createAzureProviders( config: AzureConfig, logger?: Logger ): AzureProviders {
    const tokens = new TokenProvider( config );
    const directory = new GraphDirectoryClient( createGraphApi( tokens ) );
    const authorization = new ArmAuthorizationClient( tokens, directory, { logger } );
    return { directory, authorization };
}
