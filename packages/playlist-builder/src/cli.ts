#!/usr/bin/env node
/**
 * Tagcrate - CLI Entry Point
 *
 * Builds tag playlists and combiner playlists into a collection document.
 *
 * Usage:
 *   tagcrate                               # Use ./tagcrate.yml or defaults
 *   tagcrate --collection ./library.json   # Custom collection
 *   tagcrate --config ./my.yml             # Custom config
 *   tagcrate --init                        # Generate example configs
 */

import * as fs from 'fs';
import { loadConfig, generateExampleConfig, type BuilderConfig } from './config';
import { applyToDocument, buildPlaylists } from './orchestrators/playlist-builder';
import { readCollection, writeCollection, defaultOutputPath } from './services/collection-store';
import { logService } from './services/log-service';
import { generateExamplePlaylistConfig, loadPlaylistConfig } from './services/playlist-config';
import { createPlaylistFilters } from './tree/playlist-filters';
import { computeTagStatistics, formatTagStatistics } from './utils/tag-statistics';

// Parse command line arguments
function parseArgs(): {
  configPath?: string;
  collection?: string;
  output?: string;
  remainder?: string;
  stats?: boolean;
  init?: boolean;
  help?: boolean;
  version?: boolean;
} {
  const args = process.argv.slice(2);
  const result: ReturnType<typeof parseArgs> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--config':
      case '-c':
        result.configPath = args[++i];
        break;
      case '--collection':
      case '-i':
        result.collection = args[++i];
        break;
      case '--output':
      case '-o':
        result.output = args[++i];
        break;
      case '--remainder':
      case '-r':
        result.remainder = args[++i];
        break;
      case '--stats':
        result.stats = true;
        break;
      case '--init':
        result.init = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      case '--version':
      case '-v':
        result.version = true;
        break;
      default:
        console.warn(`Ignoring unknown argument: ${arg}`);
    }
  }

  return result;
}

function printHelp(): void {
  console.log(`
Tagcrate Playlist Builder

Usage: tagcrate [options]

Options:
  -c, --config <path>       Path to config file (YAML or JSON)
  -i, --collection <path>   Collection document (default: ./collection.json)
  -o, --output <path>       Output document (default: auto_<collection>)
  -r, --remainder <mode>    Bucket untaxonomized tags: folder or playlist
      --stats               Print tag statistics of combiner playlists
      --init                Generate example tagcrate.yml and playlists.yml
  -h, --help                Show this help message
  -v, --version             Show version

Environment Variables:
  TAGCRATE_COLLECTION       Collection document path
  TAGCRATE_OUTPUT           Output document path
  TAGCRATE_PLAYLIST_CONFIG  Playlist config path
  TAGCRATE_REMAINDER        Remainder mode (folder, playlist)
  TAGCRATE_PURE_GENRES      Comma separated genres for "Pure" playlists
  TAGCRATE_PLAYLIST_FILTERS Comma separated filters to enable (HipHopFilter,
                            MinimalDeepTechFilter, ComplexTrackFilter,
                            TransitionTrackFilter); others are disabled
  TAGCRATE_LOG_LEVEL        Log level (debug, info, warn, error)

Examples:
  tagcrate --init                                 # Generate configs
  tagcrate --collection ./library.json            # Build playlists
  tagcrate --remainder playlist --stats           # Single Other playlist
  TAGCRATE_LOG_LEVEL=debug tagcrate               # Verbose output
`);
}

function printVersion(): void {
  console.log('Tagcrate v0.1.0');
}

function writeExample(fileName: string, content: string): void {
  if (fs.existsSync(fileName)) {
    console.log(`${fileName} already exists, skipping`);
    return;
  }
  fs.writeFileSync(fileName, content);
  console.log(`Generated ${fileName}`);
}

async function main(): Promise<void> {
  const args = parseArgs();

  if (args.help) {
    printHelp();
    process.exit(0);
  }

  if (args.version) {
    printVersion();
    process.exit(0);
  }

  if (args.init) {
    writeExample('tagcrate.yml', generateExampleConfig());
    writeExample('playlists.yml', generateExamplePlaylistConfig());
    console.log('\nEdit the files and run: tagcrate --config tagcrate.yml');
    process.exit(0);
  }

  // Load configuration
  let config: BuilderConfig;
  try {
    config = loadConfig({ configPath: args.configPath });

    // Override with CLI args
    if (args.collection) {
      config.collection.path = args.collection;
    }
    if (args.output) {
      config.collection.output = args.output;
    }
    if (args.remainder !== undefined) {
      config.playlists.remainder = args.remainder;
    }
    if (args.stats) {
      config.playlists.printStatistics = true;
    }
  } catch (error) {
    console.error('Failed to load configuration:', error instanceof Error ? error.message : error);
    process.exit(1);
  }

  logService.setLevel(config.logging.level);

  const playlistConfig = loadPlaylistConfig(config.playlists.config);
  const document = readCollection(config.collection.path);

  const result = buildPlaylists(document, playlistConfig, {
    remainder: config.playlists.remainder,
    pureGenrePlaylists: config.playlists.pureGenrePlaylists,
    genreDelimiter: config.playlists.genreDelimiter,
    filters: createPlaylistFilters(config.playlists.filters)
  });

  if (config.playlists.printStatistics) {
    console.log(formatTagStatistics(computeTagStatistics(result.combinerResults, result.parserIndexes)));
  }

  const output = config.collection.output || defaultOutputPath(config.collection.path);
  writeCollection(output, applyToDocument(document, result.tree));

  if (result.diagnostics.length > 0) {
    console.warn(`\nFinished with ${result.diagnostics.length} warning(s)`);
  }
}

// Run CLI
main().catch((error) => {
  console.error('Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
