#!/usr/bin/env node
/**
 * @fileoverview Ejecutable de la CLI: conecta SIGINT con la cancelación y fija el código de salida.
 * @module bin
 */

import { logger } from './utils';
import { EXIT_CODES, main } from './cli';

const log = logger.child('CLI');
const controller = new AbortController();
process.once('SIGINT', () => controller.abort());

main(process.argv.slice(2), { signal: controller.signal })
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    log.error('Error inesperado en la CLI:', error);
    process.exitCode = EXIT_CODES.FAILED;
  });
