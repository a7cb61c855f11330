import 'dotenv/config';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { parseArgs } from 'util';
import { loadConfig, logger } from '../src/config/index.js';
import { createLyricsEngine } from '../src/engine/factory.js';
import { serializeMatchResult } from '../src/engine/matchers/semantic.js';
import { formatSearchReport } from '../src/engine/report.js';
import { CatalogLyricsSource } from '../src/songs/lyrics-source.js';

/**
 * Catalog Search
 *
 * Runs the search pipeline against a local JSON catalog:
 *   npm run search -- "walking home in the rain" [--catalog file.json] [--mood sad] [--limit 5] [--json]
 */

const __dirname = dirname(fileURLToPath(import.meta.url));
const DEFAULT_CATALOG = join(__dirname, '../data/sample-catalog.json');

async function main() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      catalog: { type: 'string', default: DEFAULT_CATALOG },
      mood: { type: 'string' },
      limit: { type: 'string' },
      'auto-mood': { type: 'boolean', default: false },
      json: { type: 'boolean', default: false }
    }
  });

  const text = positionals.join(' ');
  if (!text) {
    logger.error('Usage: search-catalog "<text>" [--catalog file.json] [--mood id] [--limit n] [--auto-mood] [--json]');
    process.exitCode = 1;
    return;
  }

  const startTime = Date.now();
  const engine = createLyricsEngine(loadConfig());
  const source = await CatalogLyricsSource.fromFile(values.catalog ?? DEFAULT_CATALOG);
  const pipeline = engine.createSearchPipeline(source);

  const outcome = await pipeline.search({
    text,
    limit: values.limit ? Number(values.limit) : undefined,
    autoMood: values['auto-mood'],
    filters: values.mood ? { mood: values.mood } : undefined
  });

  if (values.json) {
    console.log(JSON.stringify({ ...outcome, results: outcome.results.map(serializeMatchResult) }, null, 2));
    return;
  }

  const preset = outcome.moodId ? engine.moodClassifier.getPreset(outcome.moodId) : undefined;
  const report = formatSearchReport(outcome, {
    moodLabel: preset && `${preset.emoji} ${preset.name}`,
    catalogSize: source.size,
    durationMs: Date.now() - startTime
  });
  console.log(report.join('\n'));
}

main().catch(error => {
  logger.error({ error }, 'Search failed');
  process.exitCode = 1;
});
