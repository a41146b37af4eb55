/**
 * Dependency injection tokens, grouped by concern.
 *
 * Registrations live in container.ts; consumers resolve through these symbols
 * so ports can be swapped (tests register fakes before resolving).
 */
export const DI = {
  Config: {
    /** Validated application configuration. */
    App: Symbol('Config.App'),
  },

  Logging: {
    /** ILoggerFactory for component loggers. */
    Factory: Symbol('Logging.Factory'),
  },

  Crypto: {
    /** Keccak256Port */
    Keccak256: Symbol('Crypto.Keccak256'),
  },

  Encoding: {
    /** EmitMetaEncoderPort */
    EmitMeta: Symbol('Encoding.EmitMeta'),
  },

  Resolver: {
    /** MetadataResolverPort. Optional: unregistered means offline stores. */
    Metadata: Symbol('Resolver.Metadata'),
  },

  Store: {
    /** The process-wide MetaStore. */
    Meta: Symbol('Store.Meta'),
  },
} as const;
