import { existsSync, readFileSync, statSync } from 'node:fs';
import { basename, resolve } from 'node:path';
import type { Logger } from 'pino';
import { parse as parseYaml } from 'yaml';
import { ConversionEngine, eventDefinitionListSchema } from '../../application/index.js';
import { RuleDefinitionError } from '../../domain/index.js';
import type { ServiceConfig } from './service-config.js';

type LoaderLogger = Pick<Logger, 'info' | 'debug'>;

/**
 * Finds the event definitions file.
 *
 * Tries the configured path (relative to `cwd`) first, then a file of the
 * same name under `<cwd>/config/`. Returns `null` when neither exists.
 */
export function resolveDefinitionsFile(configured: string, cwd: string = process.cwd()): string | null {
  const candidates = [resolve(cwd, configured), resolve(cwd, 'config', basename(configured))];
  for (const candidate of candidates) {
    if (existsSync(candidate) && statSync(candidate).isFile()) {
      return candidate;
    }
  }
  return null;
}

/**
 * Loads the raw definition list from YAML.
 *
 * A missing file or an empty document yields an empty list. Anything that
 * is not a list of definitions is a definition error.
 */
export function loadEventDefinitions(
  configured: string,
  log: LoaderLogger,
  cwd?: string,
): unknown[] {
  const file = resolveDefinitionsFile(configured, cwd);
  if (file === null) {
    log.debug({ configured }, 'No Event Definitions configuration file found! Using default config.');
    return [];
  }

  log.debug({ file }, 'Event Definitions configuration file');

  let document: unknown;
  try {
    document = parseYaml(readFileSync(file, 'utf-8'));
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new RuleDefinitionError(`Unreadable event definitions file ${file}: ${reason}`);
  }

  if (document === null || document === undefined) return [];

  const list = eventDefinitionListSchema.safeParse(document);
  if (!list.success) {
    throw new RuleDefinitionError(
      `Event definitions file ${file} must contain a list of definitions`,
      {},
      document,
    );
  }
  return list.data;
}

/**
 * Builds the conversion engine from the configured definitions file and
 * drop policy, logging the effective rule table.
 *
 * @throws RuleDefinitionError; the service must not start with a partial table.
 */
export function setupEvents(
  config: Pick<ServiceConfig, 'eventDefinitionsFile' | 'allowDroppingOfNotifications'>,
  log: LoaderLogger,
  cwd?: string,
): ConversionEngine {
  const definitions = loadEventDefinitions(config.eventDefinitionsFile, log, cwd);
  log.info({ definitions }, 'Event Definitions');

  const engine = ConversionEngine.build(definitions, {
    dropUnmatched: config.allowDroppingOfNotifications,
  });

  log.info(
    { dropUnmatched: engine.dropUnmatched, ruleCount: engine.rules.length, rules: engine.describe() },
    'Event conversion rules loaded',
  );
  return engine;
}
