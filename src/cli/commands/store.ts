import type { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { RegistryUseCase } from '../../application/RegistryUseCase.js';
import { DatabaseManager } from '../../infrastructure/sqlite/DatabaseManager.js';
import { SqlitePathStore } from '../../infrastructure/sqlite/SqlitePathStore.js';
import { PathNotFoundError } from '../../domain/errors/DomainErrors.js';
import { loadConfig } from '../../config/ConfigLoader.js';
import { Logger } from '../../shared/Logger.js';
import { OutputFormatter, resolveFormat } from '../formatters/OutputFormatter.js';
import type { OutputFormat } from '../formatters/OutputFormatter.js';

interface StoreOptions {
  root: string;
  format?: string;
}

interface StoreContext {
  registry: RegistryUseCase;
  format: OutputFormat;
  formatter: OutputFormatter;
}

/** 開啟 DB、執行 fn，結束後關閉 */
function withRegistry(opts: StoreOptions, fn: (ctx: StoreContext) => void): void {
  const config = loadConfig(opts.root);
  const format = resolveFormat(opts.format, config.output.format);
  const logger = new Logger('pathfrac', config.log.level);

  const dbPath = path.resolve(opts.root, config.store.dbPath);
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  const dbMgr = new DatabaseManager(dbPath, logger.child('DatabaseManager'));

  try {
    const registry = new RegistryUseCase(
      new SqlitePathStore(dbMgr.getDb()),
      logger.child('RegistryUseCase'),
    );
    fn({ registry, format, formatter: new OutputFormatter() });
  } finally {
    dbMgr.close();
  }
}

/**
 * 註冊 store 指令群組
 *
 * 用法：
 *   pathfrac store save <label> <path>
 *   pathfrac store get <label>
 *   pathfrac store list
 *   pathfrac store remove <label>
 *   pathfrac store descendants <label>
 */
export function registerStoreCommand(program: Command): void {
  const storeCmd = program
    .command('store')
    .description('Keep labelled path identifiers in a local SQLite database');

  storeCmd
    .command('save <label> <path>')
    .description('Save (or overwrite) a labelled path')
    .option('--root <dir>', 'Directory containing .pathfrac.json', '.')
    .option('--format <format>', 'Output format: json or text')
    .action((label: string, pathText: string, opts: StoreOptions) => {
      withRegistry(opts, ({ registry, format, formatter }) => {
        const stored = registry.save(label, pathText);
        process.stdout.write(formatter.formatObject(registry.toView(stored), format) + '\n');
      });
    });

  storeCmd
    .command('get <label>')
    .description('Show a stored path')
    .option('--root <dir>', 'Directory containing .pathfrac.json', '.')
    .option('--format <format>', 'Output format: json or text')
    .action((label: string, opts: StoreOptions) => {
      withRegistry(opts, ({ registry, format, formatter }) => {
        const stored = registry.lookup(label);
        process.stdout.write(formatter.formatObject(registry.toView(stored), format) + '\n');
      });
    });

  storeCmd
    .command('list')
    .description('List all stored paths')
    .option('--root <dir>', 'Directory containing .pathfrac.json', '.')
    .option('--format <format>', 'Output format: json or text')
    .action((opts: StoreOptions) => {
      withRegistry(opts, ({ registry, format, formatter }) => {
        const views = registry.list().map((stored) => registry.toView(stored));
        process.stdout.write(formatter.formatObject(views, format) + '\n');
      });
    });

  storeCmd
    .command('remove <label>')
    .description('Remove a stored path')
    .option('--root <dir>', 'Directory containing .pathfrac.json', '.')
    .option('--format <format>', 'Output format: json or text')
    .action((label: string, opts: StoreOptions) => {
      withRegistry(opts, ({ registry, format, formatter }) => {
        if (!registry.remove(label)) {
          throw new PathNotFoundError(label);
        }
        process.stdout.write(formatter.formatObject({ label, removed: true }, format) + '\n');
      });
    });

  storeCmd
    .command('descendants <label>')
    .description('List stored paths below a stored path, in document order')
    .option('--root <dir>', 'Directory containing .pathfrac.json', '.')
    .option('--format <format>', 'Output format: json or text')
    .action((label: string, opts: StoreOptions) => {
      withRegistry(opts, ({ registry, format, formatter }) => {
        const views = registry.descendants(label).map((stored) => registry.toView(stored));
        process.stdout.write(formatter.formatObject(views, format) + '\n');
      });
    });
}
