import { InvalidArgumentError, Option } from 'commander';
import { isOutputFormat, OUTPUT_FORMATS, type OutputFormat } from './format.ts';

export function parseOutputFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new InvalidArgumentError(`Allowed choices are ${OUTPUT_FORMATS.join(', ')}.`);
  }
  return value;
}

/**
 * --format オプション
 */
export function createFormatOption(defaultFormat: OutputFormat): Option {
  return new Option('--format <format>', `Output format (${OUTPUT_FORMATS.join(', ')})`)
    .argParser(parseOutputFormat)
    .default(defaultFormat);
}
