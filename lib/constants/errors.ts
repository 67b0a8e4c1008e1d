/**
 * @fileoverview Constantes de mensajes de error del motor de descargas.
 * @module constants/errors
 *
 * Fuente única de verdad para textos de error; las clases de lib/engines/errors
 * y los logs construyen sus mensajes a partir de estas constantes.
 */

// =====================
// ERRORES GENERALES
// =====================

export const GENERAL_ERRORS = {
  UNKNOWN: 'Error desconocido',
  INVALID_CONFIG: 'Configuración inválida',
} as const;

// =====================
// ERRORES DE DESCARGA
// =====================

export const DOWNLOAD_ERRORS = {
  INVALID_SIZE: 'Tamaño inválido',
  INVALID_TASK: 'Tarea de descarga inválida',
  CHUNK_FAILED: 'Chunk falló después de múltiples reintentos',
  DOWNLOAD_FAILED: 'La descarga falló',
  CANCELLED: 'Descarga cancelada',
  SIZE_MISMATCH: 'Tamaño incorrecto del archivo final',
  INTEGRITY_MISMATCH: 'El hash del archivo no coincide con el esperado',
  PROGRESS_SAVE_FAILED: 'No se pudo guardar el progreso',
  FALLBACK_FAILED: 'La descarga en un solo stream falló',
} as const;

// =====================
// ERRORES DE RED
// =====================

export const NETWORK_ERRORS = {
  RANGE_UNSUPPORTED: 'El servidor no respeta las peticiones HTTP Range',
  CONTENT_RANGE_MISMATCH: 'Content-Range no coincide con el rango pedido',
  RANGE_TRUNCATED: 'El servidor recortó el rango pedido',
  CONNECTION_CLOSED: 'Conexión cerrada prematuramente',
  TOO_MANY_BYTES: 'El servidor envió más bytes de los pedidos',
  TOO_MANY_REDIRECTS: 'Demasiadas redirecciones',
  UNSUPPORTED_PROTOCOL: 'Protocolo no soportado',
  TIMEOUT: 'Tiempo de espera agotado',
} as const;

export const ERRORS = {
  GENERAL: GENERAL_ERRORS,
  DOWNLOAD: DOWNLOAD_ERRORS,
  NETWORK: NETWORK_ERRORS,
} as const;

export type ErrorsMap = typeof ERRORS;

export default ERRORS;
