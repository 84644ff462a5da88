import { randomUUID } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';

import type { Metadata, Value } from '@domain/dmi-metadata/index.js';
import { formatValue } from '@domain/dmi-metadata/index.js';

import {
  ParseMetadataCommand,
  ParseMetadataHandler,
} from '@/application/dmi-metadata/index.js';
import { DmiMetadataParserService } from '@/infrastructure/dmi-metadata/index.js';
import { calculateFrameTimingStats, stateFrameDelaysMs } from '@/shared/media/frameTiming.js';

interface InspectOptions {
  input: string;
  json: boolean;
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  const text = await fs.readFile(path.resolve(options.input), 'utf8');

  const handler = new ParseMetadataHandler(new DmiMetadataParserService({ cacheEntries: 0 }));
  const metadata = await handler.execute(
    new ParseMetadataCommand({ id: randomUUID(), source: { type: 'text', text } }),
  );

  if (options.json) {
    console.log(JSON.stringify(toJson(metadata), null, 2));
    return;
  }

  const { header } = metadata;
  console.log(`DMI ${header.version.toFixed(1)} ${header.width}x${header.height}, ${metadata.states.length} state(s)`);
  console.table(
    metadata.states.map((state) => {
      const timing = calculateFrameTimingStats(stateFrameDelaysMs(state));
      return {
        name: state.name,
        dirs: state.dirs,
        frames: state.frames,
        icons: state.iconCount,
        fps: timing.fps,
        loop: state.loopFlag ?? '-',
        hotspot: state.hotspot ? state.hotspot.join(',') : '-',
      };
    }),
  );
}

function unknownToJson(unknown: ReadonlyMap<string, Value> | undefined): Record<string, string> | undefined {
  if (!unknown) return undefined;
  return Object.fromEntries([...unknown].map(([key, value]) => [key, formatValue(value)]));
}

function toJson(metadata: Metadata): Record<string, unknown> {
  return {
    header: {
      version: metadata.header.version,
      width: metadata.header.width,
      height: metadata.header.height,
      unknown: unknownToJson(metadata.header.unknown),
    },
    states: metadata.states.map((state) => ({
      name: state.name,
      dirs: state.dirs,
      frames: state.frames,
      delays: state.delays,
      loop: state.loopFlag,
      rewind: state.rewind,
      movement: state.movement,
      hotspot: state.hotspot,
      unknown: unknownToJson(state.unknown),
    })),
  };
}

function parseArgs(argv: string[]): InspectOptions {
  const options: Partial<InspectOptions> = { json: false };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg.startsWith('--')) continue;

    switch (arg) {
      case '--input':
        options.input = argv[i + 1];
        i += 1;
        break;
      case '--json':
        options.json = true;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  if (!options.input) {
    throw new Error('Usage: npm run inspect -- --input <metadata.txt> [--json]');
  }

  return { input: options.input, json: options.json ?? false };
}

main().catch((error) => {
  console.error('[inspect-metadata] fatal:', error);
  process.exitCode = 1;
});
