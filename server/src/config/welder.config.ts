import * as fs from 'fs';
import { ConfigError } from '../errors/conversion.errors';

export interface OperationSettings {
  /** Z height the nozzle is lowered to for the weld, in mm */
  operationHeight: number;
  /** Dwell at operation height, in seconds */
  operationDuration: number;
  /** Spacing of the first weld pass when multipass welding is enabled, in mm */
  initialDotSpacing: number;
  /** Dwell before each later pass of a path, in seconds */
  coolingTimeBetweenPasses: number;
}

export interface WelderConfig {
  printer: {
    bedSizeX: number;
    bedSizeY: number;
    enableBedLeveling: boolean;
  };
  temperatures: {
    heatingEnabled: boolean;
    bedTemperature: number;
    nozzleTemperature: number;
    chamberTemperature: number;
    useChamberHeating: boolean;
    cooldownTemperature: number;
    enableCooldown: boolean;
  };
  movement: {
    moveHeight: number;
    lowTravelHeight: number;
    endRaiseHeight: number;
    xySpeed: number;
    zSpeed: number;
    weldCompressionOffset: number;
  };
  normalWelds: OperationSettings;
  frangibleWelds: OperationSettings;
  sequence: {
    dotSpacing: number;
    multipassEnabled: boolean;
    includeUserPause: boolean;
    userPauseMessage: string;
  };
  output: {
    extension: string;
    maxFilenameLength: number;
  };
}

export type ReadonlyWelderConfig = {
  readonly [S in keyof WelderConfig]: Readonly<WelderConfig[S]>;
};

export const DEFAULT_CONFIG: ReadonlyWelderConfig = {
  printer: {
    bedSizeX: 250,
    bedSizeY: 220,
    enableBedLeveling: false,
  },
  temperatures: {
    heatingEnabled: true,
    bedTemperature: 35,
    nozzleTemperature: 160,
    chamberTemperature: 35,
    useChamberHeating: false,
    cooldownTemperature: 50,
    enableCooldown: false,
  },
  movement: {
    moveHeight: 5,
    lowTravelHeight: 1.2,
    endRaiseHeight: 10,
    xySpeed: 3000,
    zSpeed: 600,
    weldCompressionOffset: 0.3,
  },
  normalWelds: {
    operationHeight: 0.02,
    operationDuration: 0.1,
    initialDotSpacing: 3.6,
    coolingTimeBetweenPasses: 2,
  },
  frangibleWelds: {
    operationHeight: 0.15,
    operationDuration: 0.5,
    initialDotSpacing: 3.6,
    coolingTimeBetweenPasses: 1.5,
  },
  sequence: {
    dotSpacing: 2,
    multipassEnabled: false,
    includeUserPause: true,
    userPauseMessage: 'Insert plastic sheets...',
  },
  output: {
    extension: '.gcode',
    maxFilenameLength: 31,
  },
};

/** Line breaks and other control characters would end a G-code line early */
export const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f]/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge `override` into a copy of `base`. Only keys already present in
 * `base` are taken, and a value must have the same primitive type as the
 * default it replaces.
 */
function mergeSection<T extends object>(base: T, override: unknown, section: string): T {
  const merged: T = { ...base };
  if (override === undefined) return merged;
  if (!isRecord(override)) {
    throw new ConfigError(`Configuration section '${section}' must be an object`);
  }

  for (const key of Object.keys(override)) {
    if (!(key in base)) {
      throw new ConfigError(`Unknown configuration key '${section}.${key}'`);
    }
    const current: unknown = Reflect.get(base, key);
    const next = override[key];
    if (typeof next !== typeof current) {
      throw new ConfigError(
        `Configuration key '${section}.${key}' must be a ${typeof current}, got ${typeof next}`
      );
    }
    Reflect.set(merged, key, next);
  }
  return merged;
}

/**
 * Deep-merge an override document (parsed JSON or a request body) over a
 * base configuration. Unknown sections or keys are rejected.
 */
export function mergeConfig(base: ReadonlyWelderConfig, override: unknown): WelderConfig {
  if (override !== undefined && !isRecord(override)) {
    throw new ConfigError('Configuration must be an object');
  }
  const source: Record<string, unknown> = isRecord(override) ? override : {};

  for (const section of Object.keys(source)) {
    if (!(section in base)) {
      throw new ConfigError(`Unknown configuration section '${section}'`);
    }
  }

  return {
    printer: mergeSection(base.printer, source.printer, 'printer'),
    temperatures: mergeSection(base.temperatures, source.temperatures, 'temperatures'),
    movement: mergeSection(base.movement, source.movement, 'movement'),
    normalWelds: mergeSection(base.normalWelds, source.normalWelds, 'normalWelds'),
    frangibleWelds: mergeSection(base.frangibleWelds, source.frangibleWelds, 'frangibleWelds'),
    sequence: mergeSection(base.sequence, source.sequence, 'sequence'),
    output: mergeSection(base.output, source.output, 'output'),
  };
}

export function validateConfig(config: ReadonlyWelderConfig): void {
  const { printer, temperatures, movement, sequence, output } = config;

  if (printer.bedSizeX <= 0 || printer.bedSizeY <= 0) {
    throw new ConfigError('printer.bedSizeX and printer.bedSizeY must be positive');
  }
  if (temperatures.bedTemperature < 0 || temperatures.bedTemperature > 150) {
    throw new ConfigError('bedTemperature must be between 0 and 150°C');
  }
  if (temperatures.nozzleTemperature < 0 || temperatures.nozzleTemperature > 300) {
    throw new ConfigError('nozzleTemperature must be between 0 and 300°C');
  }
  if (temperatures.chamberTemperature < 0 || temperatures.cooldownTemperature < 0) {
    throw new ConfigError('chamberTemperature and cooldownTemperature must be non-negative');
  }
  if (movement.moveHeight < 0 || movement.lowTravelHeight < 0 || movement.endRaiseHeight < 0) {
    throw new ConfigError('Travel heights must be non-negative');
  }
  if (movement.xySpeed <= 0 || movement.zSpeed <= 0) {
    throw new ConfigError('movement.xySpeed and movement.zSpeed must be positive');
  }

  for (const section of ['normalWelds', 'frangibleWelds'] as const) {
    const weld = config[section];
    if (weld.operationHeight < 0) {
      throw new ConfigError(`${section}.operationHeight must be non-negative`);
    }
    if (weld.operationDuration < 0) {
      throw new ConfigError(`${section}.operationDuration must be non-negative`);
    }
    if (!(weld.initialDotSpacing > 0)) {
      throw new ConfigError(`${section}.initialDotSpacing must be positive`);
    }
    if (weld.coolingTimeBetweenPasses < 0) {
      throw new ConfigError(`${section}.coolingTimeBetweenPasses must be non-negative`);
    }
  }

  if (!(sequence.dotSpacing > 0)) {
    throw new ConfigError('sequence.dotSpacing must be positive');
  }
  if (CONTROL_CHARACTERS.test(sequence.userPauseMessage)) {
    throw new ConfigError('sequence.userPauseMessage must not contain control characters');
  }
  if (!Number.isInteger(output.maxFilenameLength) || output.maxFilenameLength <= 0) {
    throw new ConfigError('output.maxFilenameLength must be a positive integer');
  }
}

function freezeConfig(config: WelderConfig): ReadonlyWelderConfig {
  for (const section of Object.values(config)) {
    Object.freeze(section);
  }
  return Object.freeze(config);
}

/**
 * Build a validated, frozen configuration from the defaults and an optional
 * override document.
 */
export function resolveConfig(
  override?: unknown,
  base: ReadonlyWelderConfig = DEFAULT_CONFIG
): ReadonlyWelderConfig {
  const merged = mergeConfig(base, override);
  validateConfig(merged);
  return freezeConfig(merged);
}

/**
 * Load configuration from a JSON file. Falls back to `WELDER_CONFIG`, then to
 * the built-in defaults when no file is given.
 */
export function loadConfig(configPath: string | undefined = process.env.WELDER_CONFIG): ReadonlyWelderConfig {
  if (!configPath) {
    return resolveConfig();
  }

  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Configuration file '${configPath}' could not be read: ${reason}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid JSON configuration in '${configPath}': ${reason}`);
  }

  const config = resolveConfig(parsed);
  console.log(`[Config] Loaded configuration from ${configPath}`);
  return config;
}
