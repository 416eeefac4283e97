// Identity Normalizer - turns exported sign-in names into names searchable in the target directory
import { DirectoryProvider } from '../types';
import { ConfigurationError } from '../errors';

/** Marker the directory inserts into the sign-in name of invited guests */
export const EXTERNAL_MARKER = '#EXT#';

export interface DirectoryDomains {
    verified: string[];
    initialDomain: string;
}

export interface NormalizedIdentity {
    loginName: string;
    isExternalHint: boolean;
}

/**
 * Truncate a sign-in name at the external marker, if present.
 */
export function stripExternalMarker( value: string ): { value: string; hadMarker: boolean } {
    const index = value.indexOf( EXTERNAL_MARKER );
    if ( index < 0 ) {
        return { value, hadMarker: false };
    }
    return { value: value.substring( 0, index ), hadMarker: true };
}

/**
 * Guests are named `localpart_homedomain`; rebuild `localpart@homedomain`
 * by splitting on the last underscore. Values without an underscore come back unchanged.
 */
export function reconstructGuestAddress( value: string ): string {
    const index = value.lastIndexOf( '_' );
    if ( index < 0 ) {
        return value;
    }
    return `${value.substring( 0, index )}@${value.substring( index + 1 )}`;
}

export function domainSuffix( value: string ): string | undefined {
    const index = value.lastIndexOf( '@' );
    if ( index < 0 ) {
        return undefined;
    }
    return value.substring( index + 1 );
}

/**
 * A suffix counts as verified when any verified domain contains it, ignoring case.
 */
export function isVerifiedDomain( suffix: string, verifiedDomains: readonly string[] ): boolean {
    const needle = suffix.toLowerCase();
    return verifiedDomains.some( domain => domain.toLowerCase().includes( needle ) );
}

export function toExternalLoginName( address: string, initialDomain: string ): string {
    return `${address.replace( /@/g, '_' )}${EXTERNAL_MARKER}@${initialDomain}`;
}

/**
 * Map an exported sign-in name onto the login name it would carry in the target directory.
 *
 * Names without the external marker are returned as they are. Guest names are
 * rebuilt to their home address; if that address belongs to a verified domain
 * of the target it is used directly, otherwise it is re-wrapped as a guest of
 * the target's initial domain.
 */
export function normalizeSignInName( signInName: string, domains: DirectoryDomains ): NormalizedIdentity {
    const stripped = stripExternalMarker( signInName );
    if ( !stripped.hadMarker ) {
        return { loginName: signInName, isExternalHint: false };
    }

    const address = reconstructGuestAddress( stripped.value );
    const suffix = domainSuffix( address );

    // No address to classify: keep the truncated value
    if ( suffix === undefined ) {
        return { loginName: address, isExternalHint: true };
    }

    if ( isVerifiedDomain( suffix, domains.verified ) ) {
        return { loginName: address, isExternalHint: true };
    }

    return { loginName: toExternalLoginName( address, domains.initialDomain ), isExternalHint: true };
}

/**
 * Read the target directory's verified domains and pick its initial domain.
 */
export async function loadDirectoryDomains( directory: DirectoryProvider ): Promise<DirectoryDomains> {
    const domains = await directory.listVerifiedDomains();
    if ( domains.length === 0 ) {
        throw new ConfigurationError( 'The target directory reported no verified domains' );
    }

    const initial = domains.find( domain => domain.isInitial )
        ?? domains.find( domain => domain.name.toLowerCase().endsWith( '.onmicrosoft.com' ) );
    if ( !initial ) {
        throw new ConfigurationError( 'The target directory has no initial (*.onmicrosoft.com) domain' );
    }

    return {
        verified: domains.map( domain => domain.name ),
        initialDomain: initial.name
    };
}
