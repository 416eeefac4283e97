// Client-credential tokens for Microsoft Graph and Azure Resource Manager
import { AuthenticationResult, ConfidentialClientApplication } from '@azure/msal-node';
import { AzureConfig } from '../config';
import { AuthenticationError } from '../errors';

export const GRAPH_SCOPE = 'https://graph.microsoft.com/.default';
export const ARM_SCOPE = 'https://management.azure.com/.default';

export interface TokenSource {
    getToken( scope: string ): Promise<string>;
}

export class TokenProvider implements TokenSource {
    private msalClient: ConfidentialClientApplication;

    constructor( config: AzureConfig ) {
        // Initialize MSAL confidential client application
        this.msalClient = new ConfidentialClientApplication( {
            auth: {
                clientId: config.clientId,
                clientSecret: config.clientSecret,
                authority: `${config.authorityHost.replace( /\/+$/, '' )}/${config.tenantId}`
            }
        } );
    }

    /**
     * Acquire an app-only token for `scope`. MSAL caches tokens until they near expiry.
     */
    async getToken( scope: string ): Promise<string> {
        let response: AuthenticationResult | null;
        try {
            response = await this.msalClient.acquireTokenByClientCredential( { scopes: [ scope ] } );
        } catch ( error ) {
            throw new AuthenticationError(
                `Failed to acquire access token: ${error instanceof Error ? error.message : 'Unknown error'}`,
                { scope }
            );
        }

        if ( !response?.accessToken ) {
            throw new AuthenticationError( 'The identity platform returned no access token', { scope } );
        }
        return response.accessToken;
    }
}
