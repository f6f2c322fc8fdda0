/**
 * CLI script: generate a batch of shape sorter tasks on disk.
 *
 * Usage:
 *   npx tsx scripts/generate-tasks.ts [--count N] [--out DIR] [--difficulty easy|medium|hard]
 *     [--domain NAME] [--width W] [--height H] [--videos] [--fps F] [--max-duration S] [--seed N]
 *
 * Layout: DIR/<domain>_task/<taskId>/{first_frame.png, final_frame.png, prompt.txt, ground_truth.gif}
 */
import { copyFileSync, mkdirSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { ConfigError, TaskGenerator, createRng, parseTaskConfig } from '../src';

const USAGE = 'Usage: npx tsx scripts/generate-tasks.ts [--count N] [--out DIR] [--difficulty D] '
  + '[--domain NAME] [--width W] [--height H] [--videos] [--fps F] [--max-duration S] [--seed N]';

function die(msg: string): never {
  console.error(`Error: ${msg}`);
  process.exit(1);
}

function num(flag: string, value: string | undefined): number {
  if (value === undefined) die(`${flag} needs a value\n${USAGE}`);
  const n = Number(value);
  if (Number.isNaN(n)) die(`${flag} expects a number, got "${value}"`);
  return n;
}

const args = process.argv.slice(2);
if (args.includes('--help') || args.includes('-h')) {
  console.log(USAGE);
  process.exit(0);
}

const raw: Record<string, unknown> = {};
let count = 10;
let outDir = 'data';
let seed: number | undefined;

for (let i = 0; i < args.length; i++) {
  const arg = args[i];
  if (arg === '--count') count = num(arg, args[++i]);
  else if (arg === '--out') outDir = args[++i] ?? die(`--out needs a value\n${USAGE}`);
  else if (arg === '--difficulty') raw.difficulty = args[++i] ?? die(`--difficulty needs a value\n${USAGE}`);
  else if (arg === '--domain') raw.domain = args[++i] ?? die(`--domain needs a value\n${USAGE}`);
  else if (arg === '--width') raw.width = num(arg, args[++i]);
  else if (arg === '--height') raw.height = num(arg, args[++i]);
  else if (arg === '--videos') raw.generateVideos = true;
  else if (arg === '--fps') raw.videoFps = num(arg, args[++i]);
  else if (arg === '--max-duration') raw.maxVideoDuration = num(arg, args[++i]);
  else if (arg === '--seed') seed = num(arg, args[++i]);
  else die(`Unknown argument: ${arg}\n${USAGE}`);
}

if (!Number.isInteger(count) || count < 1) die(`--count must be a positive integer, got ${count}`);

let generator: TaskGenerator;
try {
  const config = parseTaskConfig(raw);
  generator = new TaskGenerator(config, seed === undefined ? {} : { rng: createRng(seed) });
} catch (err) {
  if (err instanceof ConfigError) die(err.message);
  throw err;
}

const { domain } = generator.config;
const taskRoot = resolve(outDir, `${domain}_task`);

for (let index = 0; index < count; index++) {
  const taskId = `${domain}_${String(index).padStart(4, '0')}`;
  const pair = generator.generateTaskPair(taskId);
  const dir = join(taskRoot, taskId);
  mkdirSync(dir, { recursive: true });

  writeFileSync(join(dir, 'first_frame.png'), pair.firstImage.toBuffer('image/png'));
  writeFileSync(join(dir, 'final_frame.png'), pair.finalImage.toBuffer('image/png'));
  writeFileSync(join(dir, 'prompt.txt'), pair.prompt + '\n');
  if (pair.groundTruthVideoPath) {
    copyFileSync(pair.groundTruthVideoPath, join(dir, 'ground_truth.gif'));
  }
  console.log(`Wrote ${dir}${pair.groundTruthVideoPath ? ' (with video)' : ''}`);
}

console.log(`Generated ${count} ${domain} task(s) in ${taskRoot}`);
