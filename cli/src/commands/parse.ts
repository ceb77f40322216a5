import { parseDiagram, resolveEngineConfig } from 'flowscribe-engine';
import { createLogger, readDiagramText } from '../context.js';
import { writeJson } from '../output.js';

/** Print the parsed description of a diagram file. Nothing is rendered or stored. */
export function runParse(file: string, env: NodeJS.ProcessEnv = process.env): void {
  const logger = createLogger(resolveEngineConfig(env));
  writeJson(parseDiagram(readDiagramText(file), logger));
}
