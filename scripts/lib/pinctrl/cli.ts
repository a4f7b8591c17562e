import path from 'node:path';

import { type PromptAdapter, interactivePromptAdapter } from '../cli_prompts.js';
import { type Reporter, consoleReporter } from '../diagnostics.js';
import {
  CHECK_FLAG,
  type PendingWrite,
  commitWrites,
  getRunOptions,
  prepareJsonWrite,
  prepareTextWrite,
  repoPath,
  toPosixRelative
} from '../io.js';
import { familyVariants, loadFamilyTable } from './families.js';
import { buildDefinitions, renderPinctrlHeader } from './header.js';
import { modelToJson } from './model_json.js';
import { buildFamilyModel } from './sources.js';
import { CONSISTENCY_POLICIES, type ConsistencyPolicy } from './types.js';

const KNOWN_OPTIONS = ['family', 'workdir', 'out', 'json', 'families', 'consistency'] as const;

type OptionName = (typeof KNOWN_OPTIONS)[number];

export interface PinctrlCliOptions {
  family?: string;
  workdir: string;
  outDir: string;
  jsonPath?: string;
  familiesPath?: string;
  consistency: ConsistencyPolicy;
  check: boolean;
}

export interface PinctrlRunResult {
  family: string;
  headerPath: string;
  jsonPath?: string;
  check: boolean;
  changed: boolean;
}

export interface CliDependencies {
  prompt: PromptAdapter;
  reporter: Reporter;
}

export function parseCliOptionMap(args: string[]): Map<string, string> {
  const options = new Map<string, string>();

  for (let index = 0; index < args.length; index += 1) {
    const keyToken = args[index];
    if (!keyToken.startsWith('--')) {
      throw new Error(`Unexpected argument '${keyToken}'. Expected --key value pairs`);
    }

    const key = keyToken.slice(2).trim();
    if (!key) {
      throw new Error(`Invalid option '${keyToken}'`);
    }

    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new Error(`Missing value for option '--${key}'`);
    }

    options.set(key, value);
    index += 1;
  }

  return options;
}

function isOptionName(key: string): key is OptionName {
  return KNOWN_OPTIONS.some((name) => name === key);
}

function isConsistencyPolicy(value: string): value is ConsistencyPolicy {
  return CONSISTENCY_POLICIES.some((policy) => policy === value);
}

export function resolveCliOptions(argv: string[]): PinctrlCliOptions {
  const { check } = getRunOptions(argv);
  const optionMap = parseCliOptionMap(argv.filter((token) => token !== CHECK_FLAG));

  for (const key of optionMap.keys()) {
    if (!isOptionName(key)) {
      throw new Error(`Unknown option '--${key}'. Expected one of ${KNOWN_OPTIONS.map((name) => `--${name}`).join(', ')}`);
    }
  }

  const consistency = optionMap.get('consistency') ?? 'warn';
  if (!isConsistencyPolicy(consistency)) {
    throw new Error(`Invalid --consistency '${consistency}'. Expected ${CONSISTENCY_POLICIES.join('|')}`);
  }

  const jsonPath = optionMap.get('json');
  const familiesPath = optionMap.get('families');

  return {
    family: optionMap.get('family'),
    workdir: path.resolve(optionMap.get('workdir') ?? process.cwd()),
    outDir: path.resolve(optionMap.get('out') ?? repoPath('out')),
    jsonPath: jsonPath === undefined ? undefined : path.resolve(jsonPath),
    familiesPath: familiesPath === undefined ? undefined : path.resolve(familiesPath),
    consistency,
    check
  };
}

function writeStatus(check: boolean, result: PendingWrite): string {
  if (check) {
    return result.changed ? 'Would update' : 'Up to date';
  }
  return result.changed ? 'Updated' : 'No changes';
}

export async function runPinctrlCli(
  argv: string[] = process.argv.slice(2),
  deps: CliDependencies = { prompt: interactivePromptAdapter, reporter: consoleReporter }
): Promise<PinctrlRunResult> {
  const options = resolveCliOptions(argv);
  const { reporter } = deps;
  const table = await loadFamilyTable(options.familiesPath);

  const family =
    options.family ??
    (await deps.prompt.select({
      message: 'Device family:',
      choices: Array.from(table.entries(), ([name, variants]) => ({
        name,
        value: name,
        description: variants.join(', ')
      }))
    }));
  const variants = familyVariants(table, family);

  const model = await buildFamilyModel(options.workdir, variants, {
    reporter,
    consistency: options.consistency
  });
  const header = renderPinctrlHeader(family, buildDefinitions(model, reporter));

  const headerPath = path.join(options.outDir, `${family}-pinctrl.h`);
  const pending = [await prepareTextWrite(headerPath, header)];
  if (options.jsonPath) {
    pending.push(await prepareJsonWrite(options.jsonPath, modelToJson(family, variants, model)));
  }

  await commitWrites(pending, { check: options.check });
  for (const write of pending) {
    reporter.info(`${writeStatus(options.check, write)} ${toPosixRelative(write.filePath)}`);
  }

  return {
    family,
    headerPath,
    jsonPath: options.jsonPath,
    check: options.check,
    changed: pending.some((write) => write.changed)
  };
}
