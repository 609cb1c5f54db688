/**
 * Packaging of the FFmpeg installation prefix.
 *
 * Copy rules select files from the prefix into a package tree. The tree is
 * left as-is in an output directory, or named after the FFmpeg version and
 * archived by a container run into the artifacts directory.
 */

import { join } from 'path';
import { minimatch } from 'minimatch';
import type { BuildContext, PackageRule, Variant } from '../../types/index.js';
import type { ProcessRunner } from '../ports/process.js';
import type { ContainerRunner } from '../build/container-runner.js';
import { CONTAINER_PATHS, WORK_LAYOUT } from '../../constants/index.js';
import { getContextLabel } from '../build-context.js';
import { appendTextFile, copyFile, ensureDir, exists, isDirectory, listEntries, remove, walkFiles, writeTextFile } from '../../utils/fs.js';
import { PackagingError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface PackageOptions {
  context: BuildContext;
  variant: Variant;
  /** Host work directory holding the FFmpeg checkout and installation prefix */
  workDir: string;
  artifactsDir: string;
  outputDir?: string;
  image: string;
  containers: ContainerRunner;
  processes: ProcessRunner;
  env?: NodeJS.ProcessEnv;
}

export interface PackageResult {
  /** Versioned build name; only archived builds get one */
  buildName?: string;
  packageDir: string;
  /** Archive file name inside the artifacts directory, when one was made */
  archive?: string;
  files: number;
}

export function formatBuildName(version: string, context: BuildContext): string {
  return `ffmpeg-${version}-${getContextLabel(context)}`;
}

export function archiveNameFor(buildName: string, context: BuildContext): string {
  return context.target.startsWith('win') ? `${buildName}.zip` : `${buildName}.tar.xz`;
}

/**
 * Ask the FFmpeg checkout for its version string.
 */
export async function readFfmpegVersion(processes: ProcessRunner, ffmpegDir: string): Promise<string> {
  const script = join(ffmpegDir, 'ffbuild', 'version.sh');
  if (!(await exists(script))) {
    throw new PackagingError(`FFmpeg checkout has no ${script}`, { ffmpegDir });
  }
  const result = await processes.run('sh', [script, ffmpegDir], { stdio: 'pipe' });
  const version = result.stdout.trim();
  if (result.exitCode !== 0 || version === '') {
    throw new PackagingError(`could not determine the FFmpeg version (exit ${result.exitCode})`, {
      stderr: result.stderr.trim()
    });
  }
  return version;
}

async function collectRuleFiles(sourceDir: string, rule: PackageRule): Promise<string[]> {
  if (!(await isDirectory(sourceDir))) {
    return [];
  }

  const candidates: string[] = [];
  if (rule.recursive) {
    for await (const file of walkFiles(sourceDir)) {
      candidates.push(file);
    }
  } else {
    for (const entry of await listEntries(sourceDir)) {
      if (!entry.isDirectory) {
        candidates.push(entry.name);
      }
    }
  }

  return candidates.filter(file => rule.include.some(pattern => minimatch(file, pattern)));
}

/**
 * Apply the copy rules from a prefix into a package directory.
 * Returns the number of files copied.
 */
export async function applyPackageRules(
  prefixDir: string,
  packageDir: string,
  rules: readonly PackageRule[]
): Promise<number> {
  let copied = 0;
  for (const rule of rules) {
    const sourceDir = join(prefixDir, rule.from);
    const files = await collectRuleFiles(sourceDir, rule);

    if (files.length === 0) {
      if (rule.optional) {
        logger.debug(`Optional package rule matched nothing`, { from: rule.from, include: rule.include });
        continue;
      }
      throw new PackagingError(`no files in '${rule.from}' match ${rule.include.join(', ')}`, {
        from: rule.from,
        include: [...rule.include]
      });
    }

    for (const file of files) {
      await copyFile(join(sourceDir, file), join(packageDir, rule.to, file));
    }
    copied += files.length;
  }
  return copied;
}

function renderArchiveScript(buildName: string, archive: string, context: BuildContext): string {
  const command = context.target.startsWith('win')
    ? `zip -9 -r "${CONTAINER_PATHS.OUT}/${archive}" "${buildName}"`
    : `tar cJf "${CONTAINER_PATHS.OUT}/${archive}" "${buildName}"`;
  return ['#!/bin/bash', 'set -xe', `cd ${CONTAINER_PATHS.ROOT}/${WORK_LAYOUT.PKGROOT}`, command, ''].join('\n');
}

export async function packageBuild(options: PackageOptions): Promise<PackageResult> {
  const { context, variant, workDir } = options;
  const env = options.env ?? process.env;
  const ffmpegDir = join(workDir, WORK_LAYOUT.FFMPEG);
  const prefixDir = join(workDir, WORK_LAYOUT.PREFIX);

  const fillPackage = async (packageDir: string): Promise<number> => {
    await ensureDir(packageDir);
    const files = await applyPackageRules(prefixDir, packageDir, variant.packageRules);
    if (variant.licenseFile) {
      const license = join(ffmpegDir, variant.licenseFile);
      if (!(await exists(license))) {
        throw new PackagingError(`license file '${variant.licenseFile}' not found in the FFmpeg checkout`);
      }
      await copyFile(license, join(packageDir, 'LICENSE.txt'));
    }
    return files;
  };

  if (options.outputDir) {
    const files = await fillPackage(options.outputDir);
    logger.info(`Packaged ${getContextLabel(context)} into ${options.outputDir}`);
    return { packageDir: options.outputDir, files };
  }

  const buildName = formatBuildName(await readFfmpegVersion(options.processes, ffmpegDir), context);
  const pkgRoot = join(workDir, WORK_LAYOUT.PKGROOT);
  const packageDir = join(pkgRoot, buildName);
  await remove(pkgRoot);
  const files = await fillPackage(packageDir);

  const archive = archiveNameFor(buildName, context);
  const script = join(workDir, 'package.sh');
  await ensureDir(options.artifactsDir);
  await writeTextFile(script, renderArchiveScript(buildName, archive, context));

  const exitCode = await options.containers.run({
    image: options.image,
    workDir,
    script,
    mounts: [{ host: options.artifactsDir, container: CONTAINER_PATHS.OUT }]
  });
  if (exitCode !== 0) {
    throw new PackagingError(`archiving ${archive} failed with exit code ${exitCode}`, { exitCode });
  }
  await remove(pkgRoot);
  await remove(script);

  if (env.GITHUB_ACTIONS) {
    if (env.GITHUB_OUTPUT) {
      await appendTextFile(env.GITHUB_OUTPUT, `build_name=${buildName}\n`);
    }
    await writeTextFile(join(options.artifactsDir, `${getContextLabel(context)}.txt`), `${archive}\n`);
  }

  logger.info(`Packaged ${archive}`, { artifactsDir: options.artifactsDir });
  return { buildName, packageDir, archive, files };
}
