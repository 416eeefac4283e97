// Principal Resolver tests
import {
    classifyMatches,
    OWNER_ROLE_DEFINITION_ID,
    PrincipalResolver,
    resolveRoleTarget
} from './index';
import { ResolveError } from '../errors';
import { FakeDirectory, makeRecord } from '../test/fakes';

describe( 'PrincipalResolver', () => {
    let directory: FakeDirectory;
    let resolver: PrincipalResolver;

    beforeEach( () => {
        directory = new FakeDirectory();
        resolver = new PrincipalResolver( directory, {
            verified: [ 'fabrikam.com', 'fabrikam.onmicrosoft.com' ],
            initialDomain: 'fabrikam.onmicrosoft.com'
        } );
    } );

    describe( 'groups', () => {
        const record = makeRecord( { objectType: 'Group', displayName: 'Platform Ops', signInName: null } );

        it( 'should report NotFound when no group matches', async () => {
            const result = await resolver.resolve( record );

            expect( result.ok ).toBe( false );
            if ( !result.ok ) {
                expect( result.error ).toBeInstanceOf( ResolveError );
                expect( result.error.reason ).toBe( 'NotFound' );
            }
        } );

        it( 'should resolve a unique match to its target id', async () => {
            directory.groups = [ { id: 'target-group-1', displayName: 'Platform Ops', principalType: 'Group' } ];

            const result = await resolver.resolve( record );

            expect( result ).toEqual( { ok: true, value: { objectId: 'target-group-1', objectType: 'Group' } } );
            expect( directory.calls ).toEqual( [ 'group:Platform Ops' ] );
        } );

        it( 'should report Ambiguous when several groups share the name', async () => {
            directory.groups = [
                { id: 'target-group-1', displayName: 'Platform Ops', principalType: 'Group' },
                { id: 'target-group-2', displayName: 'Platform Ops', principalType: 'Group' }
            ];

            const result = await resolver.resolve( record );

            expect( result.ok ).toBe( false );
            if ( !result.ok ) {
                expect( result.error.reason ).toBe( 'Ambiguous' );
                expect( result.error.message ).toBe( 'Group "Platform Ops" matched 2 objects in the target directory' );
                expect( result.error.context?.candidates ).toEqual( [ 'target-group-1', 'target-group-2' ] );
            }
        } );
    } );

    describe( 'users', () => {
        it( 'should look members up by their sign-in name', async () => {
            directory.users = [ { id: 'target-user-1', displayName: 'Jane Doe', principalType: 'User', signInName: 'jane@fabrikam.com' } ];

            const result = await resolver.resolve( makeRecord() );

            expect( result ).toEqual( { ok: true, value: { objectId: 'target-user-1', objectType: 'User' } } );
            expect( directory.calls ).toEqual( [ 'user:jane@fabrikam.com' ] );
        } );

        it( 'should look guests up by their normalized name', async () => {
            directory.users = [ {
                id: 'target-guest-1',
                displayName: 'Sam Guest',
                principalType: 'User',
                signInName: 'sam_contoso.com#EXT#@fabrikam.onmicrosoft.com'
            } ];

            const result = await resolver.resolve( makeRecord( { signInName: 'sam_contoso.com#EXT#@source.onmicrosoft.com' } ) );

            expect( result.ok ).toBe( true );
            expect( directory.calls ).toEqual( [ 'user:sam_contoso.com#EXT#@fabrikam.onmicrosoft.com' ] );
        } );

        it( 'should turn a former guest from a now-verified domain into a member lookup', async () => {
            await resolver.resolve( makeRecord( { signInName: 'sam_fabrikam.com#EXT#@source.onmicrosoft.com' } ) );

            expect( directory.calls ).toEqual( [ 'user:sam@fabrikam.com' ] );
        } );

        it( 'should report NotFound without a sign-in name', async () => {
            const result = await resolver.resolve( makeRecord( { signInName: null } ) );

            expect( result.ok ).toBe( false );
            if ( !result.ok ) {
                expect( result.error.reason ).toBe( 'NotFound' );
            }
            expect( directory.calls ).toEqual( [] );
        } );

        it( 'should report Ambiguous for duplicate sign-in names', async () => {
            directory.users = [
                { id: 'u1', displayName: 'Jane', principalType: 'User', signInName: 'jane@fabrikam.com' },
                { id: 'u2', displayName: 'Jane', principalType: 'User', signInName: 'JANE@fabrikam.com' }
            ];

            const result = await resolver.resolve( makeRecord() );

            expect( !result.ok && result.error.reason ).toBe( 'Ambiguous' );
        } );
    } );

    describe( 'service principals', () => {
        it( 'should always be Unsupported without querying the directory', async () => {
            const result = await resolver.resolve( makeRecord( {
                objectType: 'ServicePrincipal',
                displayName: 'deploy-pipeline',
                signInName: null,
                roleDefinitionName: 'Contributor'
            } ) );

            expect( result.ok ).toBe( false );
            if ( !result.ok ) {
                expect( result.error.reason ).toBe( 'Unsupported' );
                expect( result.error.message ).toBe(
                    'Service principal "deploy-pipeline" must be assigned "Contributor" at /subscriptions/source-sub manually'
                );
            }
            expect( directory.calls ).toEqual( [] );
        } );
    } );

    it( 'should let provider failures propagate', async () => {
        jest.spyOn( directory, 'findGroupByDisplayName' ).mockRejectedValue( new Error( 'graph unavailable' ) );

        await expect( resolver.resolve( makeRecord( { objectType: 'Group' } ) ) ).rejects.toThrow( 'graph unavailable' );
    } );
} );

describe( 'classifyMatches', () => {
    it( 'should classify by count', () => {
        const principal = { id: 'a', displayName: 'A', principalType: 'Group' as const };

        expect( classifyMatches( [] ) ).toEqual( { kind: 'NotFound' } );
        expect( classifyMatches( [ principal ] ) ).toEqual( { kind: 'Unique', principal } );
        expect( classifyMatches( [ principal, principal ] ).kind ).toBe( 'Ambiguous' );
    } );
} );

describe( 'resolveRoleTarget', () => {
    it( 'should keep the recorded scope and role for ordinary roles', () => {
        const record = makeRecord( { scope: '/subscriptions/source-sub/resourceGroups/rg-web' } );

        expect( resolveRoleTarget( record, 'target-sub' ) ).toEqual( {
            scope: '/subscriptions/source-sub/resourceGroups/rg-web',
            roleDefinitionId: 'acdd72a7-3385-48ef-bd42-f606fba81ae7'
        } );
    } );

    it( 'should map co-administrators to Owner on the subscription root', () => {
        const record = makeRecord( {
            roleDefinitionName: 'CoAdministrator',
            roleDefinitionId: '',
            scope: '/subscriptions/source-sub/resourceGroups/rg-web'
        } );

        expect( resolveRoleTarget( record, 'target-sub' ) ).toEqual( {
            scope: '/subscriptions/target-sub',
            roleDefinitionId: OWNER_ROLE_DEFINITION_ID
        } );
    } );

    it( 'should compare the co-administrator name without regard to case', () => {
        const record = makeRecord( { roleDefinitionName: 'coadministrator' } );

        expect( resolveRoleTarget( record, 'target-sub' ).roleDefinitionId ).toBe( OWNER_ROLE_DEFINITION_ID );
    } );
} );
