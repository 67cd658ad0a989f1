#!/usr/bin/env tsx

/**
 * Generate a JSON Schema for dataset catalog entries
 *
 * Lets operators validate a hand-written catalog before handing it to the
 * collector.
 *
 * Usage:
 *   tsx scripts/generate-schema.ts [output-path]
 *   npm run generate:schema
 */

import fs from 'fs';
import path from 'path';
import { catalogJsonSchema } from '../src/config/ConfigValidator';
import { DEFAULT_CATALOG } from '../src/config/catalog';
import { VERSION } from '../src/version';

const OUTPUT_PATH = process.argv[2] ?? path.join(__dirname, '../schema/dataset-descriptor.schema.json');

function generateSchema() {
  console.log('🔨 Generating catalog JSON Schema from Zod...');

  const schemaWithMetadata = {
    $schema: 'http://json-schema.org/draft-07/schema#',
    title: 'DatasetDescriptor',
    description: 'One entry of the collector dataset catalog',
    version: VERSION,
    ...catalogJsonSchema(),
    examples: DEFAULT_CATALOG.slice(0, 2),
  };

  fs.mkdirSync(path.dirname(OUTPUT_PATH), { recursive: true });
  fs.writeFileSync(OUTPUT_PATH, JSON.stringify(schemaWithMetadata, null, 2), 'utf-8');

  console.log(`✅ JSON Schema generated: ${OUTPUT_PATH}`);
  console.log(`📄 Fields: name, primaryPath, alternatePaths, params, paginate, rateLimit`);
}

try {
  generateSchema();
} catch (error: unknown) {
  console.error('❌ Failed to generate JSON Schema:', error instanceof Error ? error.message : error);
  process.exitCode = 1;
}
