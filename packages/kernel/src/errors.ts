/**
 * Playhost Kernel — Error Types
 *
 * Hard failures only. Build, load and consumer failures are recovered
 * locally and recorded as data; the errors here are the ones a caller has to
 * handle because the input or configuration they supplied is wrong.
 */

/**
 * A message failed an explicitly invoked validation (e.g. start-message
 * checking). Carries the accepted values so the issuer can correct it.
 */
export class MessageValidationError extends Error {
  override readonly name = 'MessageValidationError';

  constructor(
    message: string,
    readonly allowed: ReadonlyArray<string>,
    readonly received: unknown,
  ) {
    super(message);
  }
}

/**
 * No modules root could be scanned. Distinct from "zero modules found".
 */
export class DiscoveryFailedError extends Error {
  override readonly name = 'DiscoveryFailedError';

  constructor(
    readonly roots: ReadonlyArray<{ readonly rootPath: string; readonly reason: string }>,
  ) {
    super(
      `Module discovery failed: ` +
        roots.map((r) => `${r.rootPath} (${r.reason})`).join('; '),
    );
  }
}

/** A host-level operation named a module that is not in the registry. */
export class ModuleNotFoundError extends Error {
  override readonly name = 'ModuleNotFoundError';

  constructor(
    readonly moduleName: string,
    readonly available: ReadonlyArray<string>,
  ) {
    super(
      `Module not loaded: ${moduleName}. ` +
        `Loaded modules: [${available.join(', ')}].`,
    );
  }
}
