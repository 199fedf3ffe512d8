import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import YAML from 'yaml';
import { ConfigurationError, InvalidTaxonomyError } from '../errors';
import { logService } from './log-service';
import { generateExamplePlaylistConfig, loadPlaylistConfig, parsePlaylistConfig } from './playlist-config';

describe('parsePlaylistConfig', () => {
  it('maps parsers in order and defaults the combiner name', () => {
    const config = parsePlaylistConfig({
      GenreTagParser: { name: 'Genres', playlists: ['Techno'] },
      MyTagParser: { name: 'Tags', playlists: ['Dark'] },
      Combiner: { playlists: ['Techno & Dark'] }
    });

    expect(config).toEqual({
      parsers: [
        { parser: 'GenreTagParser', taxonomy: { name: 'Genres', playlists: ['Techno'] } },
        { parser: 'CommentTagParser', taxonomy: { name: 'Tags', playlists: ['Dark'] } }
      ],
      combiner: { name: 'Combiner', playlists: ['Techno & Dark'] }
    });
  });

  it('accepts an empty file', () => {
    expect(parsePlaylistConfig(null)).toEqual({ parsers: [] });
  });

  it('rejects unknown parsers', () => {
    expect(() => parsePlaylistConfig({ FooParser: 'Techno' })).toThrow(
      'FooParser is not a valid TagParser (playlist config)'
    );
  });

  it('rejects a combiner without expressions', () => {
    expect(() => parsePlaylistConfig({ Combiner: { name: 'Mixes' } })).toThrow(ConfigurationError);
  });

  it('rejects invalid taxonomies', () => {
    expect(() => parsePlaylistConfig({ GenreTagParser: { name: 'Genres', playlists: [1] } })).toThrow(
      InvalidTaxonomyError
    );
  });

  it('parses the generated example', () => {
    const config = parsePlaylistConfig(YAML.parse(generateExamplePlaylistConfig()));

    expect(config.parsers.map(p => p.parser)).toEqual(['GenreTagParser', 'CommentTagParser']);
    expect(config.combiner?.playlists).toHaveLength(3);
  });
});

describe('loadPlaylistConfig', () => {
  let dir: string;

  beforeEach(() => {
    logService.setSilent(true);
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tagcrate-playlists-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads a YAML file', () => {
    const filePath = path.join(dir, 'playlists.yml');
    fs.writeFileSync(filePath, 'CommentTagParser:\n  name: Tags\n  playlists:\n    - Dark\n');

    expect(loadPlaylistConfig(filePath).parsers).toEqual([
      { parser: 'CommentTagParser', taxonomy: { name: 'Tags', playlists: ['Dark'] } }
    ]);
  });

  it('throws for a missing file', () => {
    expect(() => loadPlaylistConfig(path.join(dir, 'missing.yml'))).toThrow(ConfigurationError);
  });
});
