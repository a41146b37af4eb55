import { ResultAsync, errAsync, ok, err } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { ResolverError } from '../../ports/metadata-resolver.port.js';

/**
 * Resolves with the first attempt that succeeds. Attempts still in flight
 * are left to finish on their own; their results are ignored.
 * Fails with RESOLVER_ALL_FAILED once every attempt has failed.
 */
export function firstOk<T>(attempts: readonly ResultAsync<T, ResolverError>[]): ResultAsync<T, ResolverError> {
  if (attempts.length === 0) {
    const noEndpoints: ResolverError = { code: 'RESOLVER_NO_ENDPOINTS', message: 'no subgraph endpoints configured' };
    return errAsync(noEndpoints);
  }

  const race = new Promise<Result<T, ResolverError>>((resolve) => {
    const failures: ResolverError[] = [];
    const fail = (error: ResolverError): void => {
      failures.push(error);
      if (failures.length === attempts.length) {
        const allFailed: ResolverError = {
          code: 'RESOLVER_ALL_FAILED',
          failures,
          message: `all ${attempts.length} endpoints failed`,
        };
        resolve(err(allFailed));
      }
    };

    for (const attempt of attempts) {
      void attempt.then(
        (result) => {
          if (result.isOk()) resolve(ok(result.value));
          else fail(result.error);
        },
        (cause: unknown) => {
          fail({
            code: 'RESOLVER_REQUEST_FAILED',
            endpoint: '(unknown)',
            message: cause instanceof Error ? cause.message : String(cause),
          });
        }
      );
    }
  });

  return new ResultAsync(race);
}
