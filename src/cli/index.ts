#!/usr/bin/env node

import { createRequire } from 'node:module';
import { Command, CommanderError } from 'commander';
import { registerCodecCommands } from './commands/codec.js';
import { registerStoreCommand } from './commands/store.js';
import { PathFracError } from '../domain/errors/DomainErrors.js';

// 從 package.json 動態讀取版本號，避免硬編碼導致版本不同步
const require = createRequire(import.meta.url);
const { version } = require('../../package.json') as { version: string };

const program = new Command();

program
  .name('pathfrac')
  .description('Encode tree paths such as 3.12.5 as a single continued-fraction identifier and back')
  .version(version);

registerCodecCommands(program);
registerStoreCommand(program);

/** 全域錯誤處理 */
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err: unknown) {
    if (err instanceof CommanderError) {
      // help / version 已輸出；其餘 commander 錯誤訊息也已寫到 stderr
      process.exit(err.code === 'commander.helpDisplayed' || err.code === 'commander.version' ? 0 : err.exitCode);
    }
    if (err instanceof PathFracError) {
      process.stderr.write(`Error [${err.code}]: ${err.message}\n`);
    } else {
      process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
    }
    process.exit(1);
  }
}

void main();
