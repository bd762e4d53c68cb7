/**
 * Runtime configuration state
 *
 * Holds the process-wide options read by validation and debug logging.
 * Options never change arithmetic results. Use `configure` from the public
 * API to update them; it validates option types before storing.
 */

/**
 * Library configuration options
 *
 * @example
 * ```typescript
 * import { configure } from 'goldilocks-field';
 *
 * configure({ validateInputs: false, debug: true });
 * ```
 */
export interface GoldilocksConfig {
  /** Range-check raw values and exponents entering kernel operations (default: true) */
  validateInputs?: boolean;
  /** Enable debug logging (default: false) */
  debug?: boolean;
}

const DEFAULT_CONFIG: Readonly<Required<GoldilocksConfig>> = {
  validateInputs: true,
  debug: false,
};

let globalConfig: Required<GoldilocksConfig> = { ...DEFAULT_CONFIG };

/**
 * Get the current library configuration
 */
export function getConfig(): Readonly<Required<GoldilocksConfig>> {
  return { ...globalConfig };
}

/**
 * Merge options into the current configuration without checking them
 */
export function applyConfig(config: GoldilocksConfig): void {
  globalConfig = { ...globalConfig, ...config };
}

/**
 * Reset configuration to defaults
 */
export function resetConfig(): void {
  globalConfig = { ...DEFAULT_CONFIG };
}
