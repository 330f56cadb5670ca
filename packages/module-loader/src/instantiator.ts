/**
 * Playhost Module Loader — Module Instantiator
 *
 * Checks a located entry export against the GameModule contract and
 * constructs it. Conformance is structural: the prototype chain must expose
 * every method in GAME_MODULE_METHODS. Nothing is registered by the module.
 *
 * Every failure (missing methods, a throwing constructor, unusable metadata)
 * comes back as a failed LoadOutcome with a short reason.
 */

import {
  createLogger,
  describeError,
  GAME_MODULE_METHODS,
  type GameModule,
  type LoadOutcome,
  type Logger,
} from '@playhost/kernel';

/** Names of contract methods `value` does not provide as functions. */
export function missingMethods(value: unknown): ReadonlyArray<string> {
  if (value === null || (typeof value !== 'object' && typeof value !== 'function')) {
    return [...GAME_MODULE_METHODS];
  }
  return GAME_MODULE_METHODS.filter((method) => typeof Reflect.get(value, method) !== 'function');
}

export function isGameModule(value: unknown): value is GameModule {
  return typeof value === 'object' && missingMethods(value).length === 0;
}

export class ModuleInstantiator {
  private readonly log: Logger;

  constructor(log?: Logger) {
    this.log = log ?? createLogger('instantiator');
  }

  /**
   * Construct `entry` with zero arguments and return the instance.
   *
   * @param name - Registry name, carried into the outcome
   * @param exportName - Export the entry was found under, used in reasons
   */
  instantiate(name: string, exportName: string, entry: unknown): LoadOutcome {
    const fail = (reason: string): LoadOutcome => {
      this.log.warn('Instantiation failed', { module: name, reason });
      return { ok: false, name, reason };
    };

    if (typeof entry !== 'function') {
      return fail(`Export "${exportName}" is not a class`);
    }

    const missing = missingMethods(entry.prototype);
    if (missing.length > 0) {
      return fail(`Export "${exportName}" does not implement GameModule (missing: ${missing.join(', ')})`);
    }

    let instance: unknown;
    try {
      instance = Reflect.construct(entry, []);
    } catch (err: unknown) {
      return fail(`Constructor of "${exportName}" threw: ${describeError(err)}`);
    }

    if (!isGameModule(instance)) {
      return fail(
        `Instance of "${exportName}" does not implement GameModule (missing: ${missingMethods(instance).join(', ')})`,
      );
    }

    try {
      const meta: unknown = instance.metadata();
      if (meta === null || typeof meta !== 'object' || typeof Reflect.get(meta, 'name') !== 'string') {
        return fail(`metadata() of "${exportName}" did not return module metadata`);
      }
    } catch (err: unknown) {
      return fail(`metadata() of "${exportName}" threw: ${describeError(err)}`);
    }

    this.log.debug('Instantiated module', { module: name, export: exportName });
    return { ok: true, name, module: instance, exportName };
  }
}
