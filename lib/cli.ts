/**
 * @fileoverview CLI del motor de descargas.
 * @module cli
 *
 * Uso: chunked-dl <url> <destino> [--sha256 <hex>] [--size <n>] [--threads <n>]
 *                 [--chunk-size <n>] [--retries <n>] [--retain-progress] [--quiet]
 *
 * Códigos de salida: 0 éxito, 1 descarga fallida, 2 uso incorrecto, 130 cancelada (Ctrl+C).
 */

import path from 'path';
import { parseArgs } from 'util';
import config from './config';
import { logger } from './utils';
import { cliOptionsSchema, formatZodIssues } from './utils/schemas';
import { DownloadCoordinator } from './engines/DownloadCoordinator';
import { EventBus } from './engines/EventBus';
import { ProgressReporter } from './engines/ProgressReporter';
import { DownloadError } from './engines/errors';
import { formatBytes } from './utils/fileHelpers';
import type { DownloadCoordinatorOptions } from './engines/DownloadCoordinator';
import type { ProgressOutput } from './engines/ProgressReporter';

const log = logger.child('CLI');

export const EXIT_CODES = Object.freeze({
  SUCCESS: 0,
  FAILED: 1,
  USAGE: 2,
  CANCELLED: 130,
} as const);

export const USAGE =
  'Uso: chunked-dl <url> <destino> [--sha256 <hex>] [--size <bytes>] [--threads <n>] ' +
  '[--chunk-size <bytes>] [--retries <n>] [--retain-progress] [--quiet]';

export interface CliDeps {
  stdout?: ProgressOutput;
  stderr?: ProgressOutput;
  signal?: AbortSignal;
  /** Opciones extra para el coordinador (los tests inyectan transport y store). */
  coordinatorOptions?: DownloadCoordinatorOptions;
}

export async function main(argv: string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;

  let parsed;
  try {
    parsed = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        sha256: { type: 'string' },
        size: { type: 'string' },
        threads: { type: 'string' },
        'chunk-size': { type: 'string' },
        retries: { type: 'string' },
        'retain-progress': { type: 'boolean' },
        quiet: { type: 'boolean', short: 'q' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (error) {
    stderr.write(`${(error as Error).message}\n${USAGE}\n`);
    return EXIT_CODES.USAGE;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    stdout.write(`${USAGE}\n`);
    return EXIT_CODES.SUCCESS;
  }
  if (positionals.length !== 2) {
    stderr.write(`${USAGE}\n`);
    return EXIT_CODES.USAGE;
  }
  const [url, destination] = positionals;

  const options = cliOptionsSchema.safeParse({
    sha256: values.sha256,
    size: values.size,
    threads: values.threads,
    chunkSize: values['chunk-size'],
    retries: values.retries,
  });
  if (!options.success) {
    stderr.write(`Opciones inválidas: ${formatZodIssues(options.error)}\n`);
    return EXIT_CODES.USAGE;
  }

  const coordinator = new DownloadCoordinator({
    threads: options.data.threads ?? config.downloads.threads,
    maxRetries: options.data.retries ?? config.downloads.maxRetries,
    retainProgressRecord: values['retain-progress'] ?? config.downloads.retainProgressRecord,
    ...deps.coordinatorOptions,
  });

  const events = new EventBus();
  const reporter = values.quiet
    ? null
    : new ProgressReporter({ label: path.basename(destination), output: stderr }).attach(events);

  try {
    const result = await coordinator.run(
      {
        url,
        destination,
        totalSize: options.data.size,
        chunkSize: options.data.chunkSize,
        expectedDigest: options.data.sha256,
      },
      { signal: deps.signal, events }
    );

    const { outcome } = result;
    if (outcome.status === 'success') {
      stdout.write(`${result.finalPath}\n`);
      stdout.write(`${result.digestAlgorithm} ${result.digest ?? ''} (${outcome.verification})\n`);
      log.info(
        `Descarga completa: ${formatBytes(result.totalBytes)} en ${result.durationMs}ms` +
          (result.resumed ? ' (reanudada)' : '') +
          (result.usedFallback ? ' (stream único)' : '')
      );
      return EXIT_CODES.SUCCESS;
    }
    if (outcome.status === 'cancelled') {
      stderr.write('Descarga cancelada; se reanudará en la próxima ejecución\n');
      return EXIT_CODES.CANCELLED;
    }
    stderr.write(`Error: ${outcome.error.message}\n`);
    return EXIT_CODES.FAILED;
  } catch (error) {
    if (error instanceof DownloadError) {
      stderr.write(`Error: ${error.message}\n`);
      return EXIT_CODES.USAGE;
    }
    throw error;
  } finally {
    reporter?.detach();
    coordinator.close();
  }
}
