/**
 * ALL file → bulk-ready CSV on disk.
 */

import { readFile } from 'node:fs/promises';
import { ConfigurationError } from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import { writeOutputFile } from '../output/index.js';
import { defaultOutputCsv, type MappingSpec } from '../transform/mapping.js';
import { convertAllFile } from '../transform/transformer.js';

export interface ConvertFlowOptions {
  inputPath: string;
  spec: MappingSpec;
  /** Overrides the mapping's `outputCsv` */
  outputPath?: string;
  logger?: Logger;
}

export interface ConvertFlowResult {
  outputPath: string;
  header: string[];
  rowCount: number;
  /** Converted CSV without BOM, ready for upload */
  text: string;
}

export async function readInputFile(inputPath: string): Promise<Buffer> {
  try {
    return await readFile(inputPath);
  } catch (error) {
    throw new ConfigurationError(`Input file not found: ${inputPath}`, { cause: String(error) });
  }
}

export async function runConvertFlow(options: ConvertFlowOptions): Promise<ConvertFlowResult> {
  const logger = options.logger ?? new NoopLogger();
  const outputPath = options.outputPath ?? defaultOutputCsv(options.spec);

  const bytes = await readInputFile(options.inputPath);
  const converted = convertAllFile(bytes, options.spec);
  await writeOutputFile(outputPath, converted.csv);

  logger.info('Converted master file', {
    masterKey: options.spec.masterKey,
    input: options.inputPath,
    output: outputPath,
    rows: converted.rowCount,
  });

  return {
    outputPath,
    header: converted.header,
    rowCount: converted.rowCount,
    text: converted.text,
  };
}
