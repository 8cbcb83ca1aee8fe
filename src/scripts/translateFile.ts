#!/usr/bin/env node
/**
 * Translates a single subtitle file from the command line
 * Run with: npm run translate-file -- <input> <targetLang> [backend] [outputFormat]
 */

import fs from 'fs';
import path from 'path';
import { formatFromFileName, formatSubtitles, parseSubtitles, resolveOutputFormat } from '../subtitles';
import { translationEngine } from '../translation';
import { countUntranslated, translatedFileName } from '../pipelines';
import { config } from '../config';

const USAGE = 'Usage: translate-file <input> <targetLang> [backend] [outputFormat]';

async function main(): Promise<void> {
  const [input, targetLang, backendArg, outputFormatArg] = process.argv.slice(2);

  if (!input || !targetLang) {
    console.error(USAGE);
    process.exit(1);
  }

  const inputPath = path.resolve(input);
  if (!fs.existsSync(inputPath)) {
    console.error(`❌ File not found: ${inputPath}`);
    process.exit(1);
  }

  const inputFormat = formatFromFileName(inputPath);
  if (!inputFormat) {
    console.error(`❌ Unsupported subtitle file: ${path.basename(inputPath)}`);
    process.exit(1);
  }

  const backend = backendArg ?? translationEngine.defaultBackend;
  const outputFormat = outputFormatArg ? resolveOutputFormat(outputFormatArg) : inputFormat;

  console.info(`\n🌐 Translating ${path.basename(inputPath)} to ${targetLang} using ${backend}\n`);

  const entries = parseSubtitles(fs.readFileSync(inputPath), inputFormat);
  console.info(`   Parsed ${entries.length} entries (${inputFormat})`);

  const texts = entries.map((entry) => entry.text);
  const translated = await translationEngine.batchTranslate(texts, 'auto', targetLang, backend, {
    useContext: config.useContextPreservation,
    contextWindow: config.contextWindowSize,
  });

  const translatedEntries = entries.map((entry, i) => ({ ...entry, text: translated[i] ?? entry.text }));
  const outputPath = path.join(path.dirname(inputPath), translatedFileName(path.basename(inputPath), outputFormat));
  fs.writeFileSync(outputPath, formatSubtitles(translatedEntries, outputFormat), 'utf-8');

  const untranslated = countUntranslated(entries, translated);
  if (untranslated > 0) {
    console.warn(`\n⚠️  ${untranslated} entries were left untranslated`);
  }

  console.info(`\n✅ Wrote ${translatedEntries.length} entries to ${outputPath}\n`);
}

main().catch((error) => {
  console.error('Error:', error);
  process.exit(1);
});
