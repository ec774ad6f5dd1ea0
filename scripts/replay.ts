#!/usr/bin/env tsx
import 'dotenv/config';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { loadConfig } from '../src/config.js';
import { listSupportedFormats } from '../src/formats/index.js';
import { MemoryMatchStore } from '../src/store/memory.js';
import { parsePointFile, playPoints } from '../src/replay.js';
import { describeSetScore } from '../src/export/text.js';
import { exportBaseName, renderCsv, renderJson, renderText } from '../src/export/index.js';
import type { MatchState } from '../src/engine/types.js';

type ExportKind = 'json' | 'csv' | 'text' | 'all';

const writeExports = async (state: MatchState, outDir: string, kind: ExportKind) => {
  await mkdir(outDir, { recursive: true });
  const base = path.join(outDir, exportBaseName(state.players));
  const written: string[] = [];

  const write = async (file: string, contents: string) => {
    await writeFile(file, contents, 'utf8');
    written.push(file);
  };

  if (kind === 'text' || kind === 'all') await write(`${base}.txt`, renderText(state));
  if (kind === 'json' || kind === 'all') await write(`${base}.json`, renderJson(state));
  if (kind === 'csv' || kind === 'all') {
    await write(`${base}_match_totals.csv`, renderCsv(state, 'totals'));
    await write(`${base}_per_set_stats.csv`, renderCsv(state, 'sets'));
    await write(`${base}_points.csv`, renderCsv(state, 'points'));
  }

  return written;
};

const runReplay = async (argv: { file: string; out?: string; format?: ExportKind }) => {
  const raw = await readFile(argv.file, 'utf8');
  const pointFile = parsePointFile(JSON.parse(raw));

  const store = new MemoryMatchStore(loadConfig().defaultFormat);
  const session = store.startMatch({
    format: pointFile.format,
    players: pointFile.players,
    location: pointFile.location,
    startingServer: pointFile.starting_server,
  });

  const summary = playPoints(session.controller, pointFile);
  const state = session.controller.snapshot();

  console.log(`${state.players.A} vs ${state.players.B} (${state.format.label})`);
  console.log(`Points played: ${summary.pointsPlayed}`);
  state.sets.forEach((set, index) => console.log(`  ${describeSetScore(set, index)}`));
  const winner = session.controller.winner();
  console.log(winner ? `Winner: ${state.players[winner]}` : `Match not finished (${state.phase})`);

  if (argv.format) {
    const outDir = argv.out ?? loadConfig().exportDir;
    const files = await writeExports(state, outDir, argv.format);
    for (const file of files) console.log(`Saved ${file}`);
  }
};

const runFormats = () => {
  for (const entry of listSupportedFormats()) {
    console.log(`${entry.choice}) ${entry.code} :: ${entry.label}`);
  }
};

async function main() {
  await yargs(hideBin(process.argv))
    .scriptName('replay')
    .command(
      'replay <file>',
      'Replay a recorded point file and print the final score',
      (cmd) =>
        cmd
          .positional('file', {
            type: 'string',
            describe: 'JSON point file',
            demandOption: true,
          })
          .option('format', {
            choices: ['json', 'csv', 'text', 'all'] as const,
            describe: 'Write summary files for the replayed match',
          })
          .option('out', {
            type: 'string',
            describe: 'Directory for exported files (defaults to EXPORT_DIR)',
          }),
      (argv) => runReplay(argv)
    )
    .command('formats', 'List supported match formats', () => {}, () => runFormats())
    .demandCommand(1)
    .strict()
    .help()
    .parseAsync();
}

main().catch((err) => {
  console.error('replay_failed', err);
  process.exitCode = 1;
});
