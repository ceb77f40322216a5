import fs from 'node:fs';
import path from 'node:path';
import {
  DiagramEngine,
  DiagramError,
  DiagramLogger,
  FilePositionBackend,
  MemorySurface,
  PositionStore,
  errorMessage,
  resolveEngineConfig,
  type EngineConfig,
} from 'flowscribe-engine';

export interface ContextOptions {
  /** Overrides FLOWSCRIBE_POSITIONS. */
  positions?: string;
  env?: NodeJS.ProcessEnv;
}

/** Everything a command needs to drive the engine headlessly. */
export interface CommandContext {
  config: EngineConfig;
  logger: DiagramLogger;
  store: PositionStore;
  engine: DiagramEngine;
  surface: MemorySurface;
}

export function createLogger(config: EngineConfig): DiagramLogger {
  // Info and debug go to the log files only; stdout is for command output.
  return new DiagramLogger({ logDir: config.logDir, consoleLevel: 'warn' });
}

export function createContext(options: ContextOptions = {}): CommandContext {
  const config = resolveEngineConfig(options.env ?? process.env);
  const logger = createLogger(config);
  const positionsPath = options.positions ? path.resolve(options.positions) : config.positionsPath;
  const store = new PositionStore({ backend: new FilePositionBackend(positionsPath), logger });
  const engine = new DiagramEngine({ store, logger, debounceMs: config.debounceMs });
  return { config, logger, store, engine, surface: new MemorySurface() };
}

export function readDiagramText(file: string): string {
  try {
    return fs.readFileSync(file, 'utf-8');
  } catch (err) {
    throw new DiagramError(`Cannot read ${file}: ${errorMessage(err)}`);
  }
}
