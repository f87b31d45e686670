#!/usr/bin/env node
import fs from 'fs/promises';
import path from 'path';
import { scanProject } from './aggregator';
import { helpText, parseArgs, resolveOutputPath } from './args';
import { writeJsonFile } from './utils';

async function run(): Promise<void> {
  const opts = parseArgs(process.argv.slice(2));
  if (opts.help) {
    console.log(helpText());
    return;
  }
  if (opts.command !== 'scan') {
    console.error(`Unknown command: ${opts.command}`);
    console.log(helpText());
    process.exitCode = 1;
    return;
  }

  const projectPath = path.resolve(opts.project);
  const stat = await fs.stat(path.resolve(opts.out)).catch(() => undefined);
  const outputPath = resolveOutputPath(opts.out, stat ? stat.isDirectory() : undefined);
  const startTime = Date.now();

  const stopSpinner = startSpinner(`Scanning Python package metadata at ${projectPath}`);
  try {
    const result = await scanProject({ projectPath, ignore: opts.ignore });
    await writeJsonFile(outputPath, result);
    stopSpinner(true);

    const descriptorCount = new Set(result.packages.map((entry) => entry.file)).size;
    const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
    console.log(`JSON written to ${outputPath}`);
    console.log(
      `Scan complete: ${result.packages.length} package${result.packages.length === 1 ? '' : 's'} from ${descriptorCount} descriptor${descriptorCount === 1 ? '' : 's'} in ${elapsed}s`
    );
    if (result.errors.length) {
      console.log(`${result.errors.length} descriptor${result.errors.length === 1 ? '' : 's'} could not be parsed:`);
      for (const failure of result.errors) {
        console.log(`  ${failure.file}: ${failure.error}`);
      }
    }
  } catch (err) {
    stopSpinner(false);
    console.error('Failed to scan project:', err);
    process.exitCode = 1;
  }
}

function startSpinner(text: string): (success?: boolean) => void {
  const frames = ['|', '/', '-', '\\'];
  let i = 0;
  process.stdout.write(`${frames[i]} ${text}`);
  const timer = setInterval(() => {
    i = (i + 1) % frames.length;
    process.stdout.write(`\r${frames[i]} ${text}`);
  }, 120);

  let stopped = false;

  return (success = true) => {
    if (stopped) return;
    stopped = true;
    clearInterval(timer);
    process.stdout.write(`\r${success ? '✔' : '✖'} ${text}\n`);
  };
}

run().catch((err) => {
  console.error(err);
  process.exit(1);
});
