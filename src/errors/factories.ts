import type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  ContainerNotInitializedError,
} from './app-error.js';

export const Err = {
  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid configuration',
  }),

  containerNotInitialized: (what: string): ContainerNotInitializedError => ({
    _tag: 'ContainerNotInitialized',
    message: `${what} requested before initializeContainer() ran`,
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;
