#!/usr/bin/env node

import { mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';
import { parseConfig, type ReconcileConfig } from './config/index.js';
import { parseAndValidateModel } from './model/validate.js';
import { getModelJsonSchemaString } from './model/json-schema.js';
import { reconcile, formatDiagnostic, type ReconcileResult } from './reconcile/index.js';
import { exportJSON } from './exporters/json.js';
import { exportReport } from './exporters/report.js';
import { buildSimulationRoom } from './simulation/glazing.js';
import { summarizeDaylight, DEFAULT_DAYLIGHT_OPTIONS } from './simulation/daylight.js';
import { formatDaylightSummary, formatRoomInfo } from './format.js';

const args = process.argv.slice(2);

// Detect subcommand
const command = args[0];

if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
  showHelp();
  process.exit(0);
}

if (command === 'extract') {
  runExtract(args.slice(1));
} else if (command === 'show') {
  runShow(args.slice(1));
} else if (command === 'simulate') {
  runSimulate(args.slice(1));
} else if (command === 'daylight') {
  runDaylight(args.slice(1));
} else if (command === 'schema') {
  runSchema(args.slice(1));
} else {
  // Default: treat first arg as a model snapshot to extract
  runExtract(args);
}

function showHelp() {
  console.log(`
roomgeo - Room, wall and window reconciliation for daylight analysis

Commands:
  roomgeo extract <model.json> [options]            Reconcile a model snapshot and write outputs
  roomgeo show <model.json> --room <code>           Print a room and its windows
  roomgeo simulate <model.json> --room <code>       Print simulation geometry for a room
  roomgeo daylight <results.json> [options]         Summarize grid illuminance results
  roomgeo schema [options]                          Output JSON Schema for the model snapshot

Extract Options:
  --config <file.json> Reconciliation settings
  --json <out.json>    Write the room tree as JSON
  --csv <dir>          Write report sheets as CSV files into <dir>
  --debug              Trace reconciliation decisions

Daylight Options:
  --room <code>        Room code shown in the summary
  --sky <lux>          Sky illuminance (default: ${DEFAULT_DAYLIGHT_OPTIONS.skyIlluminance})
  --target <percent>   Target daylight factor (default: ${DEFAULT_DAYLIGHT_OPTIONS.targetDaylightFactor})
  --pass <percent>     Area share needed to pass (default: ${DEFAULT_DAYLIGHT_OPTIONS.passAreaPercent})

Schema Options:
  --out <file.json>    Write schema to file (default: stdout)

Examples:
  roomgeo extract duplex.json --json rooms.json --csv report
  roomgeo show duplex.json --room A203
  roomgeo daylight results.json --room A203
`);
}

function fail(file: string, e: unknown): never {
  if (e instanceof Error) {
    console.error(`${file}: error: ${e.message}`);
  } else {
    console.error(`${file}: error: Unknown error occurred`);
  }
  process.exit(1);
}

function requireInput(args: string[], usage: string): string {
  if (args.length === 0 || args[0].startsWith('-')) {
    console.error('Error: No input file specified');
    console.error(`Usage: ${usage}`);
    process.exit(1);
  }
  return args[0];
}

function optionValue(args: string[], name: string): string | undefined {
  const i = args.indexOf(name);
  return i >= 0 && args[i + 1] ? args[i + 1] : undefined;
}

function numericOption(args: string[], name: string): number | undefined {
  const raw = optionValue(args, name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    console.error(`Error: ${name} expects a number, got "${raw}"`);
    process.exit(1);
  }
  return value;
}

function loadAndReconcile(inputFile: string, args: string[]): ReconcileResult {
  const configFile = optionValue(args, '--config');
  let config: ReconcileConfig | undefined;
  if (configFile) {
    try {
      config = parseConfig(readFileSync(configFile, 'utf-8'));
    } catch (e) {
      fail(resolve(configFile), e);
    }
  }

  const snapshot = parseAndValidateModel(readFileSync(inputFile, 'utf-8'));
  return reconcile(snapshot, { config, debug: args.includes('--debug') });
}

function findRoom(result: ReconcileResult, code: string | undefined) {
  if (!code) {
    console.error('Error: --room <code> is required');
    process.exit(1);
  }
  const room = result.rooms.find((r) => r.code === code);
  if (!room) {
    console.error(`Error: Unknown room "${code}". Available rooms:`);
    for (const r of result.rooms) {
      console.error(`  ${r.code}  ${r.displayName}`);
    }
    process.exit(1);
  }
  return room;
}

function slug(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-|-$/g, '');
}

function runExtract(args: string[]) {
  const inputFile = requireInput(args, 'roomgeo extract <model.json> [options]');
  const absoluteInputFile = resolve(inputFile);
  const jsonOutput = optionValue(args, '--json');
  const csvDir = optionValue(args, '--csv');

  try {
    const result = loadAndReconcile(inputFile, args);

    console.log('Reconciliation complete!');
    console.log(`  Rooms: ${result.summary.rooms}`);
    console.log(`  Windows: ${result.summary.windows}`);
    console.log(`  External doors: ${result.summary.doors}`);
    console.log(`  Walls: ${result.summary.walls}`);

    if (result.diagnostics.length > 0) {
      console.log('');
      for (const d of result.diagnostics) {
        console.log(formatDiagnostic(d));
      }
      console.log(`\n${result.diagnostics.length} warning(s), ${result.summary.unmatchedWindows} unmatched window(s).`);
    }

    if (jsonOutput) {
      writeFileSync(jsonOutput, exportJSON(result, { pretty: true, includeDiagnostics: true, includeWalls: true }));
      console.log(`  JSON written to: ${jsonOutput}`);
    }

    if (csvDir) {
      mkdirSync(csvDir, { recursive: true });
      for (const [sheet, csv] of exportReport(result)) {
        const file = join(csvDir, `${slug(sheet)}.csv`);
        writeFileSync(file, csv);
        console.log(`  ${sheet} written to: ${file}`);
      }
    }
  } catch (e) {
    fail(absoluteInputFile, e);
  }
}

function runShow(args: string[]) {
  const inputFile = requireInput(args, 'roomgeo show <model.json> --room <code>');
  try {
    const result = loadAndReconcile(inputFile, args);
    const room = findRoom(result, optionValue(args, '--room'));
    console.log(formatRoomInfo(room));
  } catch (e) {
    fail(resolve(inputFile), e);
  }
}

function runSimulate(args: string[]) {
  const inputFile = requireInput(args, 'roomgeo simulate <model.json> --room <code>');
  try {
    const result = loadAndReconcile(inputFile, args);
    const room = findRoom(result, optionValue(args, '--room'));
    const simulation = buildSimulationRoom(room);
    for (const s of simulation.skipped) {
      console.error(`warning: window ${s.tag} not placed (${s.reason})`);
    }
    console.log(JSON.stringify(simulation, null, 2));
  } catch (e) {
    fail(resolve(inputFile), e);
  }
}

function runDaylight(args: string[]) {
  const inputFile = requireInput(args, 'roomgeo daylight <results.json> [options]');
  const absoluteInputFile = resolve(inputFile);

  try {
    const data: unknown = JSON.parse(readFileSync(inputFile, 'utf-8'));
    if (!Array.isArray(data) || !data.every((v): v is number => typeof v === 'number')) {
      throw new Error('results must be a JSON array of illuminance values (lux)');
    }

    const targetDaylightFactor = numericOption(args, '--target') ?? DEFAULT_DAYLIGHT_OPTIONS.targetDaylightFactor;
    const summary = summarizeDaylight(data, {
      skyIlluminance: numericOption(args, '--sky'),
      targetDaylightFactor,
      passAreaPercent: numericOption(args, '--pass'),
    });
    console.log(formatDaylightSummary(optionValue(args, '--room') ?? inputFile, summary, targetDaylightFactor));
  } catch (e) {
    fail(absoluteInputFile, e);
  }
}

function runSchema(args: string[]) {
  const outputFile = optionValue(args, '--out');
  const schema = getModelJsonSchemaString();

  if (outputFile) {
    writeFileSync(outputFile, schema);
    console.log(`JSON Schema written to: ${outputFile}`);
  } else {
    console.log(schema);
  }
}
