import {
  createLogger,
  parseViewSettings,
  type SeqLogger,
  type ViewSettingsInput,
} from '@seqview/core';

/** Options accepted by view constructors and builders */
export interface ViewOptions<T> extends ViewSettingsInput {
  /** Parent logger; each view logs under a child named after it */
  logger?: SeqLogger;
  /** Element equality used to validate remove/update deltas */
  equals?: (a: T, b: T) => boolean;
}

/** Options accepted by derivation operations (`map`, `filter`, ...) */
export type DeriveOptions = Pick<ViewSettingsInput, 'name' | 'logLevel'>;

export interface ResolvedViewOptions<T> {
  readonly name: string;
  readonly validate: boolean;
  readonly equals: (a: T, b: T) => boolean;
  /** Logger the view was given, before the per-view child */
  readonly baseLogger: SeqLogger;
  readonly logger: SeqLogger;
}

let viewCounter = 0;

/**
 * @throws ConfigError when a setting has the wrong type
 */
export function resolveViewOptions<T>(
  kind: string,
  options: ViewOptions<T> = {}
): ResolvedViewOptions<T> {
  const settings = parseViewSettings({
    name: options.name,
    validate: options.validate,
    logLevel: options.logLevel,
  });
  const baseLogger = options.logger ?? createLogger({ module: 'seqview' });
  const name = settings.name ?? `${kind}#${++viewCounter}`;
  const logger = settings.logLevel
    ? baseLogger.child(name).withLevel(settings.logLevel)
    : baseLogger.child(name);

  return {
    name,
    validate: settings.validate,
    equals: options.equals ?? Object.is,
    baseLogger,
    logger,
  };
}
