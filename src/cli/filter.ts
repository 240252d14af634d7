#!/usr/bin/env node
/**
 * slide-filter: pandoc JSON filter running the slide filter chain
 *
 * pandoc calls it as `slide-filter <format>` with the document on stdin and
 * expects the filtered document on stdout. Progress goes to stderr.
 */

import { loadConfig, tempSettingsFromEnv } from '../core/config';
import { applyFilters, createSlideFilters } from '../core/filters';
import { parseDocument } from '../core/pandoc/ast';
import { readStdin } from './stdin';

async function main(): Promise<void> {
  const format = process.argv[2] ?? '';
  const doc = parseDocument(await readStdin());

  const filters = createSlideFilters({
    ...tempSettingsFromEnv(process.env, loadConfig()),
    onProgress: (message) => console.error(message),
  });

  await applyFilters(doc, filters, format);
  process.stdout.write(JSON.stringify(doc));
}

main().catch((err) => {
  console.error('slide-filter failed:');
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
