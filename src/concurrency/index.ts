// Bounded fan-out and per-call timeouts for provider work
import { ProviderError } from '../errors';

/**
 * Run `task` over `items` with at most `concurrency` calls in flight.
 *
 * Results keep input order; an item never started (because `shouldStop`
 * returned true or another task threw) is left `undefined`. The first error a
 * task throws is rethrown once the in-flight tasks have settled.
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    concurrency: number,
    task: ( item: T, index: number ) => Promise<R>,
    shouldStop: () => boolean = () => false
): Promise<Array<R | undefined>> {
    const results: Array<R | undefined> = new Array<R | undefined>( items.length ).fill( undefined );
    const workerCount = Math.max( 1, Math.min( Math.floor( concurrency ) || 1, items.length ) );
    let nextIndex = 0;
    const state: { failure?: { error: unknown } } = {};

    const worker = async (): Promise<void> => {
        while ( !state.failure && !shouldStop() && nextIndex < items.length ) {
            const index = nextIndex++;
            try {
                results[ index ] = await task( items[ index ], index );
            } catch ( error ) {
                state.failure = state.failure ?? { error };
            }
        }
    };

    await Promise.all( Array.from( { length: workerCount }, () => worker() ) );

    if ( state.failure ) {
        throw state.failure.error;
    }
    return results;
}

/**
 * Reject with a TIMEOUT ProviderError if `promise` has not settled within `timeoutMs`.
 * The underlying call is not cancelled and settles on its own.
 */
export async function withTimeout<T>( promise: Promise<T>, timeoutMs: number | undefined, label: string ): Promise<T> {
    if ( !timeoutMs || timeoutMs <= 0 ) {
        return promise;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>( ( _resolve, reject ) => {
        timer = setTimeout(
            () => reject( new ProviderError( `${label} timed out after ${timeoutMs}ms`, 'TIMEOUT' ) ),
            timeoutMs
        );
    } );

    try {
        return await Promise.race( [ promise, timeout ] );
    } finally {
        clearTimeout( timer );
    }
}
