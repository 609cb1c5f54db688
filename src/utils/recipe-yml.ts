import * as yaml from 'js-yaml';
import * as semver from 'semver';
import type {
  Addin,
  Condition,
  FlagField,
  FlagSet,
  HookFragment,
  HookName,
  PackageRule,
  Recipe,
  RecipeHooks,
  RecipeSource,
  Variant
} from '../types/index.js';
import { DEFAULT_PACKAGE_RULES, FLAG_FIELDS, HOOK_NAMES } from '../constants/index.js';
import { RecipeFormatError } from './errors.js';

/**
 * Parsing and validation of recipe, variant and addin YAML documents
 */

type YamlRecord = Record<string, unknown>;

export type ParsedRecipe = Omit<Recipe, 'name' | 'file' | 'group'> & { name?: string };

const CONDITION_KEYS = ['target', 'notTarget', 'variant', 'notVariant', 'addin', 'notAddin', 'ffver'] as const;
const RECIPE_KEYS = new Set<string>(['name', 'source', 'enabled', 'depends', 'skip', ...HOOK_NAMES]);
const VARIANT_KEYS = new Set<string>(['target', 'variant', 'image', 'depends', 'targetFlags', 'licenseFile', 'package', ...FLAG_FIELDS]);
const ADDIN_KEYS = new Set<string>(['name', 'ffmpegVersion', 'gitBranch', 'depends', ...FLAG_FIELDS]);

function isRecord(value: unknown): value is YamlRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function loadDocument(content: string, file: string): YamlRecord {
  let parsed: unknown;
  try {
    parsed = yaml.load(content, { filename: file });
  } catch (error) {
    throw new RecipeFormatError(file, error instanceof Error ? error.message : String(error));
  }
  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new RecipeFormatError(file, 'top level must be a mapping');
  }
  return parsed;
}

function assertKnownKeys(record: YamlRecord, allowed: ReadonlySet<string>, file: string, where: string): void {
  for (const key of Object.keys(record)) {
    if (!allowed.has(key)) {
      throw new RecipeFormatError(file, `unknown field '${key}' in ${where}`);
    }
  }
}

/**
 * Scalars are accepted where strings are expected so that `4.4` and `"4.4"` mean the same.
 */
function toText(value: unknown, file: string, field: string): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  throw new RecipeFormatError(file, `'${field}' must be a string`);
}

function optionalText(value: unknown, file: string, field: string): string | undefined {
  return value === undefined || value === null ? undefined : toText(value, file, field);
}

function toTextList(value: unknown, file: string, field: string): string[] {
  if (value === undefined || value === null) return [];
  if (Array.isArray(value)) {
    return value.map((item, index) => toText(item, file, `${field}[${index}]`));
  }
  return [toText(value, file, field)];
}

function parseCondition(value: unknown, file: string, field: string): Condition {
  if (!isRecord(value)) {
    throw new RecipeFormatError(file, `'${field}' must be a mapping`);
  }
  assertKnownKeys(value, new Set<string>(CONDITION_KEYS), file, field);

  const condition: Condition = {};
  const lists = ['target', 'notTarget', 'variant', 'notVariant', 'addin', 'notAddin'] as const;
  for (const key of lists) {
    if (value[key] !== undefined) {
      condition[key] = toTextList(value[key], file, `${field}.${key}`);
    }
  }

  if (value.ffver !== undefined) {
    const range = toText(value.ffver, file, `${field}.ffver`);
    if (semver.validRange(range) === null) {
      throw new RecipeFormatError(file, `'${field}.ffver' is not a valid version range: ${range}`);
    }
    condition.ffver = range;
  }

  return condition;
}

function parseFragment(value: unknown, file: string, field: string): HookFragment {
  if (isRecord(value)) {
    assertKnownKeys(value, new Set(['when', 'run']), file, field);
    if (value.run === undefined) {
      throw new RecipeFormatError(file, `'${field}' needs a 'run' entry`);
    }
    return {
      when: value.when === undefined ? undefined : parseCondition(value.when, file, `${field}.when`),
      lines: toTextList(value.run, file, `${field}.run`)
    };
  }
  return { lines: [toText(value, file, field)] };
}

export function parseHook(value: unknown, file: string, hook: HookName): HookFragment[] {
  if (value === undefined || value === null) return [];
  if (Array.isArray(value)) {
    return value.map((item, index) => parseFragment(item, file, `${hook}[${index}]`));
  }
  return [parseFragment(value, file, hook)];
}

function parseSource(value: unknown, file: string): RecipeSource | undefined {
  if (value === undefined || value === null || value === 'none') {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new RecipeFormatError(file, `'source' must be a mapping or 'none'`);
  }
  assertKnownKeys(value, new Set(['repo', 'commit', 'branch', 'tagFilter']), file, 'source');

  const repo = optionalText(value.repo, file, 'source.repo');
  const commit = optionalText(value.commit, file, 'source.commit');
  if (!repo || !commit) {
    throw new RecipeFormatError(file, `'source' requires both 'repo' and 'commit'`);
  }

  return {
    repo,
    commit,
    branch: optionalText(value.branch, file, 'source.branch'),
    tagFilter: optionalText(value.tagFilter, file, 'source.tagFilter')
  };
}

function parseFlags(record: YamlRecord, file: string): FlagSet {
  const read = (field: FlagField): string[] => toTextList(record[field], file, field);
  return {
    configure: read('configure'),
    cflags: read('cflags'),
    cxxflags: read('cxxflags'),
    ldflags: read('ldflags'),
    ldexeflags: read('ldexeflags'),
    libs: read('libs')
  };
}

function parsePackageRules(value: unknown, file: string): PackageRule[] {
  if (value === undefined || value === null) {
    return [...DEFAULT_PACKAGE_RULES];
  }
  if (!Array.isArray(value)) {
    throw new RecipeFormatError(file, `'package' must be a list of copy rules`);
  }
  return value.map((item, index) => {
    const where = `package[${index}]`;
    if (!isRecord(item)) {
      throw new RecipeFormatError(file, `'${where}' must be a mapping`);
    }
    assertKnownKeys(item, new Set(['from', 'to', 'include', 'recursive', 'optional']), file, where);
    const from = optionalText(item.from, file, `${where}.from`);
    if (!from) {
      throw new RecipeFormatError(file, `'${where}.from' is required`);
    }
    const include = toTextList(item.include, file, `${where}.include`);
    return {
      from,
      to: optionalText(item.to, file, `${where}.to`) ?? from,
      include: include.length > 0 ? include : ['*'],
      recursive: item.recursive === true,
      optional: item.optional === true
    };
  });
}

/**
 * Parse a recipe file with validation. Name, file and group are assigned by the registry.
 */
export function parseRecipeYml(content: string, file: string): ParsedRecipe {
  const doc = loadDocument(content, file);
  assertKnownKeys(doc, RECIPE_KEYS, file, 'recipe');

  const hooks: RecipeHooks = {};
  for (const hook of HOOK_NAMES) {
    const fragments = parseHook(doc[hook], file, hook);
    if (fragments.length > 0) {
      hooks[hook] = fragments;
    }
  }

  if (doc.skip !== undefined && typeof doc.skip !== 'boolean') {
    throw new RecipeFormatError(file, `'skip' must be true or false`);
  }

  return {
    name: optionalText(doc.name, file, 'name'),
    source: parseSource(doc.source, file),
    enabled: doc.enabled === undefined ? undefined : parseCondition(doc.enabled, file, 'enabled'),
    dependencies: toTextList(doc.depends, file, 'depends'),
    skip: doc.skip === true,
    hooks
  };
}

export function parseVariantYml(content: string, file: string): Variant {
  const doc = loadDocument(content, file);
  assertKnownKeys(doc, VARIANT_KEYS, file, 'variant');

  const target = optionalText(doc.target, file, 'target');
  const variant = optionalText(doc.variant, file, 'variant');
  if (!target || !variant) {
    throw new RecipeFormatError(file, `variant files require 'target' and 'variant'`);
  }

  return {
    target,
    variant,
    file,
    image: optionalText(doc.image, file, 'image'),
    dependencies: toTextList(doc.depends, file, 'depends'),
    flags: parseFlags(doc, file),
    targetFlags: toTextList(doc.targetFlags, file, 'targetFlags'),
    licenseFile: optionalText(doc.licenseFile, file, 'licenseFile'),
    packageRules: parsePackageRules(doc.package, file)
  };
}

export function parseAddinYml(content: string, file: string, defaultName: string): Addin {
  const doc = loadDocument(content, file);
  assertKnownKeys(doc, ADDIN_KEYS, file, 'addin');

  return {
    name: optionalText(doc.name, file, 'name') ?? defaultName,
    file,
    ffmpegVersion: optionalText(doc.ffmpegVersion, file, 'ffmpegVersion'),
    gitBranch: optionalText(doc.gitBranch, file, 'gitBranch'),
    dependencies: toTextList(doc.depends, file, 'depends'),
    flags: parseFlags(doc, file)
  };
}

const COMMIT_LINE = /^([ \t]*commit:[ \t]*)(["']?)([^"'\s#]*)\2(.*)$/m;

/**
 * Rewrite the pinned commit of a recipe document in place, keeping
 * indentation, quoting and trailing comments. Returns null when the
 * document has no commit line.
 */
export function replaceCommitPin(content: string, commit: string): string | null {
  if (!COMMIT_LINE.test(content)) {
    return null;
  }
  return content.replace(COMMIT_LINE, (_line, lead: string, quote: string, _old: string, rest: string) => {
    return `${lead}${quote}${commit}${quote}${rest}`;
  });
}
