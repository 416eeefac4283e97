// Role Assignment Reconciler tests
import { ReconcileOutcome, RoleAssignmentReconciler, rewriteSubscriptionScope } from './index';
import { OWNER_ROLE_DEFINITION_ID, PrincipalResolver } from '../resolver';
import { AuthenticationError, ProviderError, ResolveError } from '../errors';
import { FakeAuthorization, FakeDirectory, makeRecord } from '../test/fakes';
import { CreateAssignmentResult } from '../types';

describe( 'RoleAssignmentReconciler', () => {
    let directory: FakeDirectory;
    let authorization: FakeAuthorization;
    let reconciler: RoleAssignmentReconciler;

    beforeEach( () => {
        directory = new FakeDirectory();
        authorization = new FakeAuthorization();
        directory.users = [ { id: 'target-user-1', displayName: 'Jane Doe', principalType: 'User', signInName: 'jane@fabrikam.com' } ];
        directory.groups = [ { id: 'target-group-1', displayName: 'Platform Ops', principalType: 'Group' } ];
        const resolver = new PrincipalResolver( directory, {
            verified: [ 'fabrikam.com', 'fabrikam.onmicrosoft.com' ],
            initialDomain: 'fabrikam.onmicrosoft.com'
        } );
        reconciler = new RoleAssignmentReconciler( resolver, authorization );
    } );

    it( 'should create the assignment for a resolved principal', async () => {
        const [ outcome ] = await reconciler.reconcile( [ makeRecord() ], 'target-sub' );

        expect( outcome.status ).toBe( 'Assigned' );
        expect( authorization.created ).toEqual( [ {
            scope: '/subscriptions/source-sub',
            objectId: 'target-user-1',
            roleDefinitionId: 'acdd72a7-3385-48ef-bd42-f606fba81ae7'
        } ] );
    } );

    it( 'should skip the directory root scope without resolving', async () => {
        const [ outcome ] = await reconciler.reconcile( [ makeRecord( { scope: '/' } ) ], 'target-sub' );

        expect( outcome ).toMatchObject( { status: 'Skipped', reason: 'ScopeNotAssignable', index: 0 } );
        expect( directory.calls ).toEqual( [] );
        expect( authorization.created ).toEqual( [] );
    } );

    it( 'should skip the directory root scope for groups and service principals too', async () => {
        const outcomes = await reconciler.reconcile( [
            makeRecord( { objectType: 'Group', displayName: 'Platform Ops', signInName: null, scope: '/' } ),
            makeRecord( { objectType: 'ServicePrincipal', displayName: 'deploy', signInName: null, scope: '/' } )
        ], 'target-sub' );

        expect( outcomes.map( outcome => outcome.status === 'Skipped' ? outcome.reason : outcome.status ) )
            .toEqual( [ 'ScopeNotAssignable', 'ScopeNotAssignable' ] );
        expect( directory.calls ).toEqual( [] );
        expect( authorization.created ).toEqual( [] );
    } );

    it( 'should assign co-administrators as Owner on the target subscription', async () => {
        await reconciler.reconcile( [ makeRecord( {
            roleDefinitionName: 'CoAdministrator',
            roleDefinitionId: '',
            scope: '/subscriptions/source-sub'
        } ) ], 'target-sub' );

        expect( authorization.created ).toEqual( [ {
            scope: '/subscriptions/target-sub',
            objectId: 'target-user-1',
            roleDefinitionId: OWNER_ROLE_DEFINITION_ID
        } ] );
    } );

    it( 'should fail records whose principal cannot be resolved and carry on', async () => {
        const outcomes = await reconciler.reconcile( [
            makeRecord( { objectType: 'Group', displayName: 'Missing Team', signInName: null } ),
            makeRecord( { objectType: 'Group', displayName: 'Platform Ops', signInName: null } )
        ], 'target-sub' );

        expect( outcomes.map( outcome => outcome.status ) ).toEqual( [ 'Failed', 'Assigned' ] );
        const failed = outcomes[ 0 ];
        if ( failed.status === 'Failed' ) {
            expect( failed.error ).toBeInstanceOf( ResolveError );
            expect( failed.error.code ).toBe( 'RESOLVE_NOTFOUND' );
        }
    } );

    it( 'should report service principals as failed with an Unsupported reason', async () => {
        const [ outcome ] = await reconciler.reconcile( [
            makeRecord( { objectType: 'ServicePrincipal', displayName: 'deploy-pipeline', signInName: null } )
        ], 'target-sub' );

        expect( outcome.status ).toBe( 'Failed' );
        if ( outcome.status === 'Failed' && outcome.error instanceof ResolveError ) {
            expect( outcome.error.reason ).toBe( 'Unsupported' );
        }
        expect( authorization.created ).toEqual( [] );
    } );

    it( 'should treat an existing assignment as already assigned', async () => {
        const outcomes = await reconciler.reconcile( [ makeRecord(), makeRecord() ], 'target-sub' );

        expect( outcomes[ 0 ].status ).toBe( 'Assigned' );
        expect( outcomes[ 1 ] ).toMatchObject( { status: 'Skipped', reason: 'AlreadyAssigned' } );
        expect( authorization.created ).toHaveLength( 1 );
    } );

    it( 'should fail a record when the provider rejects the assignment', async () => {
        authorization.createFailures.set( 'target-user-1', new ProviderError( 'Principal missing', 'PrincipalNotFound', 400 ) );

        const [ outcome ] = await reconciler.reconcile( [ makeRecord() ], 'target-sub' );

        expect( outcome.status ).toBe( 'Failed' );
        if ( outcome.status === 'Failed' ) {
            expect( outcome.error.code ).toBe( 'PrincipalNotFound' );
        }
    } );

    it( 'should turn a thrown directory error into a failed record', async () => {
        jest.spyOn( directory, 'findUserBySignInName' ).mockRejectedValue( new Error( 'graph unavailable' ) );

        const [ outcome ] = await reconciler.reconcile( [ makeRecord() ], 'target-sub' );

        expect( outcome.status ).toBe( 'Failed' );
        if ( outcome.status === 'Failed' ) {
            expect( outcome.error ).toBeInstanceOf( ProviderError );
            expect( outcome.error.message ).toBe( 'graph unavailable' );
        }
    } );

    it( 'should abort the batch on an authentication failure', async () => {
        jest.spyOn( authorization, 'createRoleAssignment' ).mockRejectedValue( new AuthenticationError( 'token expired' ) );

        await expect( reconciler.reconcile( [ makeRecord(), makeRecord() ], 'target-sub' ) ).rejects.toBeInstanceOf( AuthenticationError );
    } );

    it( 'should resolve but never create during a dry run', async () => {
        const [ outcome ] = await reconciler.reconcile( [ makeRecord() ], 'target-sub', { dryRun: true } );

        expect( outcome ).toMatchObject( {
            status: 'Skipped',
            reason: 'DryRun',
            principal: { objectId: 'target-user-1', objectType: 'User' }
        } );
        expect( authorization.created ).toEqual( [] );
    } );

    it( 'should rewrite scopes onto the target subscription when asked', async () => {
        await reconciler.reconcile( [
            makeRecord( { scope: '/subscriptions/source-sub/resourceGroups/rg-web' } )
        ], 'target-sub', { scopeRewrite: 'target-subscription' } );

        expect( authorization.created[ 0 ].scope ).toBe( '/subscriptions/target-sub/resourceGroups/rg-web' );
    } );

    it( 'should time out a slow provider call for that record only', async () => {
        jest.spyOn( authorization, 'createRoleAssignment' ).mockImplementationOnce( () => new Promise<CreateAssignmentResult>( () => undefined ) );

        const outcomes = await reconciler.reconcile( [
            makeRecord(),
            makeRecord( { objectType: 'Group', displayName: 'Platform Ops', signInName: null } )
        ], 'target-sub', { timeoutMs: 20 } );

        expect( outcomes[ 0 ].status ).toBe( 'Failed' );
        const first = outcomes[ 0 ];
        if ( first.status === 'Failed' ) {
            expect( first.error.code ).toBe( 'TIMEOUT' );
        }
        expect( outcomes[ 1 ].status ).toBe( 'Assigned' );
    } );

    it( 'should mark records never started as cancelled', async () => {
        const controller = new AbortController();
        const seen: ReconcileOutcome[] = [];

        const outcomes = await reconciler.reconcile( [ makeRecord(), makeRecord( { displayName: 'Second' } ), makeRecord( { displayName: 'Third' } ) ], 'target-sub', {
            signal: controller.signal,
            onOutcome: outcome => {
                seen.push( outcome );
                controller.abort();
            }
        } );

        expect( outcomes.map( outcome => outcome.status ) ).toEqual( [ 'Assigned', 'Skipped', 'Skipped' ] );
        expect( outcomes[ 1 ] ).toMatchObject( { reason: 'Cancelled', index: 1 } );
        expect( seen ).toHaveLength( 3 );
    } );

    it( 'should return outcomes in input order under concurrency', async () => {
        const records = [
            makeRecord( { objectType: 'Group', displayName: 'Platform Ops', signInName: null, scope: '/subscriptions/source-sub/resourceGroups/a' } ),
            makeRecord( { scope: '/' } ),
            makeRecord( { scope: '/subscriptions/source-sub/resourceGroups/b' } )
        ];

        const outcomes = await reconciler.reconcile( records, 'target-sub', { concurrency: 3 } );

        expect( outcomes.map( outcome => outcome.index ) ).toEqual( [ 0, 1, 2 ] );
        expect( outcomes.map( outcome => outcome.record ) ).toEqual( records );
    } );
} );

describe( 'rewriteSubscriptionScope', () => {
    it( 'should replace only the subscription segment', () => {
        expect( rewriteSubscriptionScope( '/subscriptions/old/resourceGroups/rg', 'new' ) ).toBe( '/subscriptions/new/resourceGroups/rg' );
        expect( rewriteSubscriptionScope( '/subscriptions/old', 'new' ) ).toBe( '/subscriptions/new' );
    } );

    it( 'should leave non-subscription scopes alone', () => {
        expect( rewriteSubscriptionScope( '/providers/Microsoft.Management/managementGroups/mg', 'new' ) )
            .toBe( '/providers/Microsoft.Management/managementGroups/mg' );
    } );
} );
