/**
 * Tests unitarios para lib/config.ts y los schemas de entrada (lib/utils/schemas.ts)
 */
import { loadConfig, defaultConfig } from '../../lib/config';
import { ConfigError } from '../../lib/engines/errors';
import {
  cliOptionsSchema,
  taskInputSchema,
  progressRecordSchema,
  validate,
} from '../../lib/utils/schemas';

describe('loadConfig', () => {
  it('sin variables devuelve los valores por defecto', () => {
    const config = loadConfig({});
    expect(config.downloads.threads).toBe(16);
    expect(config.downloads.chunkSize).toBe(6_291_456);
    expect(config.downloads.maxRetries).toBe(5);
    expect(config.network.retryBaseDelayMs).toBe(500);
    expect(config.network.retryMaxDelayMs).toBe(30_000);
    expect(config.network.requestTimeoutMs).toBe(30_000);
    expect(config.network.headers['Accept-Encoding']).toBe('identity');
    expect(config.logging).toEqual({ level: 'info', file: null, maxSize: 10 * 1024 * 1024 });
    expect(config).toEqual(defaultConfig);
  });

  it('aplica las variables de entorno', () => {
    const config = loadConfig({
      DOWNLOAD_THREADS: '4',
      CHUNK_SIZE: '1048576',
      MAX_RETRIES: '0',
      REQUEST_TIMEOUT_MS: '5000',
      LOG_LEVEL: 'debug',
      LOG_FILE: '/var/log/dl.log',
    });
    expect(config.downloads.threads).toBe(4);
    expect(config.downloads.chunkSize).toBe(1_048_576);
    expect(config.downloads.maxRetries).toBe(0);
    expect(config.network.requestTimeoutMs).toBe(5000);
    expect(config.logging.level).toBe('debug');
    expect(config.logging.file).toBe('/var/log/dl.log');
  });

  it('las variables vacías cuentan como ausentes', () => {
    expect(loadConfig({ DOWNLOAD_THREADS: '', LOG_FILE: '' }).downloads.threads).toBe(16);
  });

  it('lanza ConfigError con el nombre de la variable inválida', () => {
    expect(() => loadConfig({ DOWNLOAD_THREADS: '0' })).toThrow(
      'Configuración inválida: DOWNLOAD_THREADS: debe ser >= 1'
    );
    expect(() => loadConfig({ CHUNK_SIZE: '1.5' })).toThrow(ConfigError);
    expect(() => loadConfig({ MAX_RETRIES: 'muchos' })).toThrow(ConfigError);
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(ConfigError);
  });
});

describe('taskInputSchema', () => {
  it('acepta una tarea mínima y normaliza el digest a minúsculas', () => {
    const result = validate(taskInputSchema, {
      url: 'https://downloads.test/a.exe',
      destination: 'a.exe',
      expectedDigest: 'ABCDEF',
    });
    expect(result).toEqual({
      success: true,
      data: { url: 'https://downloads.test/a.exe', destination: 'a.exe', expectedDigest: 'abcdef' },
    });
  });

  it('rechaza URLs que no son http(s) y destinos vacíos', () => {
    expect(validate(taskInputSchema, { url: 'ftp://downloads.test/a', destination: 'a' })).toEqual({
      success: false,
      error: 'url: La URL debe ser http o https',
    });
    expect(validate(taskInputSchema, { url: 'https://downloads.test/a', destination: '' })).toEqual({
      success: false,
      error: 'destination: La ruta de destino no puede estar vacía',
    });
  });

  it('rechaza un digest no hexadecimal', () => {
    const result = validate(taskInputSchema, {
      url: 'https://downloads.test/a',
      destination: 'a',
      expectedDigest: 'xyz',
    });
    expect(result.success).toBe(false);
    expect(result.error).toBe('expectedDigest: El digest esperado debe ser hexadecimal');
  });
});

describe('progressRecordSchema', () => {
  it('rechaza versiones desconocidas e índices negativos', () => {
    const base = {
      version: 1,
      taskId: 'abc',
      url: 'https://downloads.test/a',
      destination: '/tmp/a',
      totalSize: 10,
      chunkSize: 5,
      done: [0],
      updatedAt: 1,
    };
    expect(progressRecordSchema.safeParse(base).success).toBe(true);
    expect(progressRecordSchema.safeParse({ ...base, version: 2 }).success).toBe(false);
    expect(progressRecordSchema.safeParse({ ...base, done: [-1] }).success).toBe(false);
  });
});

describe('cliOptionsSchema', () => {
  it('convierte números y deja ausentes los no indicados', () => {
    expect(cliOptionsSchema.parse({ threads: '8', size: '1000' })).toEqual({ threads: 8, size: 1000 });
  });

  it('valida el SHA-256', () => {
    expect(cliOptionsSchema.safeParse({ sha256: 'abc' }).success).toBe(false);
    expect(cliOptionsSchema.safeParse({ sha256: 'a'.repeat(64) }).success).toBe(true);
  });
});
