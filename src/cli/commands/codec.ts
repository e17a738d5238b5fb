import type { Command } from 'commander';
import { CodecUseCase } from '../../application/CodecUseCase.js';
import { loadConfig } from '../../config/ConfigLoader.js';
import { OutputFormatter, resolveFormat } from '../formatters/OutputFormatter.js';

interface CodecOptions {
  root: string;
  format?: string;
}

/**
 * 註冊 encode / decode / compare 指令
 *
 * 用法：
 *   pathfrac encode 3.12.5
 *   pathfrac decode 502/99
 *   pathfrac decode 502,71,99,14
 *   pathfrac compare 3.12 3.12.5
 */
export function registerCodecCommands(program: Command): void {
  program
    .command('encode <path>')
    .description('Encode a dot-separated path (use "" for the root) into its identifier')
    .option('--root <dir>', 'Directory containing .pathfrac.json', '.')
    .option('--format <format>', 'Output format: json or text')
    .action((pathText: string, opts: CodecOptions) => {
      const config = loadConfig(opts.root);
      const format = resolveFormat(opts.format, config.output.format);
      const useCase = new CodecUseCase();

      const description = useCase.encode(pathText);
      process.stdout.write(new OutputFormatter().formatPath(description, format) + '\n');
    });

  program
    .command('decode <identifier>')
    .description('Decode a rational "n/d" or matrix "a,b,c,d" identifier back into its path')
    .option('--root <dir>', 'Directory containing .pathfrac.json', '.')
    .option('--format <format>', 'Output format: json or text')
    .action((identifier: string, opts: CodecOptions) => {
      const config = loadConfig(opts.root);
      const format = resolveFormat(opts.format, config.output.format);
      const useCase = new CodecUseCase();

      const description = useCase.decode(identifier);
      process.stdout.write(new OutputFormatter().formatPath(description, format) + '\n');
    });

  program
    .command('compare <left> <right>')
    .description('Compare two dot-separated paths in document order')
    .option('--root <dir>', 'Directory containing .pathfrac.json', '.')
    .option('--format <format>', 'Output format: json or text')
    .action((left: string, right: string, opts: CodecOptions) => {
      const config = loadConfig(opts.root);
      const format = resolveFormat(opts.format, config.output.format);
      const useCase = new CodecUseCase();

      const comparison = useCase.compare(left, right);
      process.stdout.write(new OutputFormatter().formatObject(comparison, format) + '\n');
    });
}
