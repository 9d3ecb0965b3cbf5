/**
 * Usage examples:
 *
 * Read:
 * npm run restaurantcfg -- --restaurant bella-cucina
 *
 * Turn the agent off (calls forward straight to staff):
 * npm run restaurantcfg -- --restaurant bella-cucina --set aiEnabled=false
 *
 * Change call hours, dry run:
 * npm run restaurantcfg -- --restaurant bella-cucina --set callHours.start=10:00 --set callHours.end=22:00 --dryRun
 *
 * Create from a JSON file and map every listed phone number:
 * npm run restaurantcfg -- --restaurant bella-cucina --file ./bella.json --syncNumbers
 */

import { readFileSync } from 'fs';
import { getRedisClient, type RedisClient } from '../src/redis/client';
import { StoredRestaurantConfigSchema, type StoredRestaurantConfig } from '../src/restaurants/restaurantConfig';
import { buildRestaurantConfigKey, buildRestaurantMapKey } from '../src/restaurants/restaurantStore';

type PatchReport = {
  path: string;
  oldValue: unknown;
  newValue: unknown;
};

type ParsedArgs = {
  restaurantId?: string;
  file?: string;
  sets: string[];
  unsets: string[];
  syncNumbers: boolean;
  dryRun: boolean;
};

type Issue = { path: Array<string | number>; message: string };

class ValidationError extends Error {
  public readonly issues: Issue[];

  constructor(issues: Issue[]) {
    super('restaurant config validation failed');
    this.issues = issues;
  }
}

const VALUE_FLAGS = ['--restaurant', '--file', '--set', '--unset'] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function applyFlag(parsed: ParsedArgs, flag: ValueFlag, value: string): void {
  switch (flag) {
    case '--restaurant':
      parsed.restaurantId = value;
      return;
    case '--file':
      parsed.file = value;
      return;
    case '--set':
      parsed.sets.push(value);
      return;
    case '--unset':
      parsed.unsets.push(value);
      return;
  }
}

function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = { sets: [], unsets: [], syncNumbers: false, dryRun: false };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === '--dryRun') {
      parsed.dryRun = true;
      continue;
    }
    if (arg === '--syncNumbers') {
      parsed.syncNumbers = true;
      continue;
    }

    const inline = VALUE_FLAGS.find((flag) => arg.startsWith(`${flag}=`));
    if (inline) {
      applyFlag(parsed, inline, arg.slice(inline.length + 1));
      continue;
    }

    const spaced = VALUE_FLAGS.find((flag) => flag === arg);
    if (spaced) {
      const value = argv[i + 1];
      if (!value) {
        throw new Error(`missing value for ${spaced}`);
      }
      applyFlag(parsed, spaced, value);
      i += 1;
      continue;
    }

    throw new Error(`unknown argument: ${arg}`);
  }

  return parsed;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function parsePath(path: string): string[] {
  const segments = path.trim().split('.');
  if (segments.some((segment) => segment.trim() === '')) {
    throw new Error(`invalid path: ${path}`);
  }
  return segments;
}

function getAtPath(obj: Record<string, unknown>, path: string): unknown {
  let current: unknown = obj;
  for (const segment of parsePath(path)) {
    if (!isPlainObject(current) || !(segment in current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

function parentAtPath(obj: Record<string, unknown>, segments: string[], create: boolean): Record<string, unknown> {
  let current = obj;
  for (const segment of segments.slice(0, -1)) {
    let next = current[segment];
    if (next === undefined && create) {
      next = {};
      current[segment] = next;
    }
    if (!isPlainObject(next)) {
      throw new Error(`invalid path segment "${segment}"`);
    }
    current = next;
  }
  return current;
}

function setAtPath(obj: Record<string, unknown>, path: string, value: unknown): void {
  const segments = parsePath(path);
  parentAtPath(obj, segments, true)[segments[segments.length - 1]] = value;
}

function unsetAtPath(obj: Record<string, unknown>, path: string): void {
  const segments = parsePath(path);
  const parent = parentAtPath(obj, segments, false);
  const leaf = segments[segments.length - 1];
  if (!(leaf in parent)) {
    throw new Error(`path not found for unset: ${path}`);
  }
  delete parent[leaf];
}

function parseValue(raw: string): unknown {
  const trimmed = raw.trim();
  const lower = trimmed.toLowerCase();

  if (lower === 'true') return true;
  if (lower === 'false') return false;
  if (lower === 'null') return null;

  if (trimmed.startsWith('{') || trimmed.startsWith('[') || trimmed.startsWith('"')) {
    try {
      return JSON.parse(trimmed);
    } catch {
      throw new Error(`invalid JSON value: ${raw}`);
    }
  }

  return trimmed;
}

function parseDocument(raw: string, source: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error(`invalid restaurant config JSON in ${source}`);
  }
  if (!isPlainObject(parsed)) {
    throw new Error(`restaurant config in ${source} must be an object`);
  }
  return parsed;
}

async function loadDocument(redis: RedisClient, args: ParsedArgs, restaurantId: string): Promise<Record<string, unknown>> {
  if (args.file) {
    return parseDocument(readFileSync(args.file, 'utf8'), args.file);
  }

  const raw = await redis.get(buildRestaurantConfigKey(restaurantId));
  if (!raw) {
    throw new Error(`restaurant config not found for "${restaurantId}"`);
  }
  return parseDocument(raw, `redis key ${buildRestaurantConfigKey(restaurantId)}`);
}

function validate(document: Record<string, unknown>, restaurantId: string): StoredRestaurantConfig {
  const result = StoredRestaurantConfigSchema.safeParse(document);
  if (!result.success) {
    throw new ValidationError(result.error.issues);
  }
  if (result.data.restaurantId !== restaurantId) {
    throw new ValidationError([{ path: ['restaurantId'], message: `does not match --restaurant ${restaurantId}` }]);
  }
  return result.data;
}

function formatValue(value: unknown): string {
  return value === undefined ? '<undefined>' : JSON.stringify(value);
}

function printIssues(issues: Issue[]): void {
  process.stderr.write('Validation failed:\n');
  for (const issue of issues) {
    const path = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    process.stderr.write(`- ${path}: ${issue.message}\n`);
  }
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const restaurantId = args.restaurantId;
  if (!restaurantId) {
    throw new Error('missing --restaurant <restaurantId>');
  }

  const redis = getRedisClient();
  try {
    const key = buildRestaurantConfigKey(restaurantId);
    const document = await loadDocument(redis, args, restaurantId);
    const isWrite = Boolean(args.file) || args.sets.length > 0 || args.unsets.length > 0 || args.syncNumbers;

    if (!isWrite) {
      process.stdout.write(`${JSON.stringify(validate(document, restaurantId), null, 2)}\n`);
      return;
    }

    const reports: PatchReport[] = [];
    for (const rawSet of args.sets) {
      const eqIndex = rawSet.indexOf('=');
      if (eqIndex <= 0) {
        throw new Error(`invalid --set value (expected path=value): ${rawSet}`);
      }
      const path = rawSet.slice(0, eqIndex).trim();
      const oldValue = getAtPath(document, path);
      setAtPath(document, path, parseValue(rawSet.slice(eqIndex + 1)));
      reports.push({ path, oldValue, newValue: getAtPath(document, path) });
    }

    for (const rawUnset of args.unsets) {
      const path = rawUnset.trim();
      const oldValue = getAtPath(document, path);
      unsetAtPath(document, path);
      reports.push({ path, oldValue, newValue: undefined });
    }

    process.stdout.write(`Redis key: ${key}\n`);
    for (const report of reports) {
      process.stdout.write(`Path: ${report.path}\n`);
      process.stdout.write(`  old: ${formatValue(report.oldValue)}\n`);
      process.stdout.write(`  new: ${formatValue(report.newValue)}\n`);
    }

    const config = validate(document, restaurantId);
    const mapKeys = args.syncNumbers ? config.phoneNumbers.map((number) => buildRestaurantMapKey(number)) : [];
    for (const mapKey of mapKeys) {
      process.stdout.write(`Map: ${mapKey} -> ${restaurantId}\n`);
    }

    if (args.dryRun) {
      process.stdout.write('Dry run: no changes written.\n');
      return;
    }

    await redis.set(key, JSON.stringify(config));
    for (const mapKey of mapKeys) {
      await redis.set(mapKey, restaurantId);
    }
    process.stdout.write('Restaurant config updated.\n');
  } finally {
    redis.disconnect();
  }
}

main().catch((error: unknown) => {
  if (error instanceof ValidationError) {
    printIssues(error.issues);
  } else {
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  }
  process.exit(1);
});
