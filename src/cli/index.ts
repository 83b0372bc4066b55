import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { createAreaCommand } from './commands/area.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PackageJsonSchema = z.object({ version: z.string() });
const VERSION = PackageJsonSchema.parse(
  JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'))
).version;

/** Create the CLI program. */
export function createCli(): Command {
  return new Command()
    .name('rect-area')
    .description('Compute rectangle areas with fixed-width overflow detection')
    .version(VERSION)
    .addCommand(createAreaCommand(), { isDefault: true });
}
