/**
 * Debug logger
 *
 * Only logs when debug is enabled through `configure`, when DEBUG contains
 * "goldilocks", or when GOLDILOCKS_DEBUG is "1" or "true".
 */

import { getConfig } from './config.js';

export function isDebugEnabled(): boolean {
  const debugEnv = process.env['DEBUG'];
  const goldilocksDebugEnv = process.env['GOLDILOCKS_DEBUG'];
  return (
    getConfig().debug ||
    debugEnv?.includes('goldilocks') === true ||
    goldilocksDebugEnv === '1' ||
    goldilocksDebugEnv === 'true'
  );
}

/**
 * Write a timestamped debug line through console.debug
 *
 * @param scope - Subsystem tag, e.g. "codec"
 */
export function debugLog(scope: string, message: string, data?: Record<string, unknown>): void {
  if (!isDebugEnabled()) {
    return;
  }

  const timestamp = new Date().toISOString();
  const prefix = `[${timestamp}] [goldilocks:${scope}]`;
  if (data) {
    console.debug(`${prefix} ${message}`, data);
  } else {
    console.debug(`${prefix} ${message}`);
  }
}
