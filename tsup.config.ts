import { defineConfig } from 'tsup';
import { readFileSync, writeFileSync } from 'node:fs';

export default defineConfig({
  entry: [
    'src/cli.ts',
    'src/pipeline/pipeline.ts',
    'src/schedule/resolver.ts',
    'src/schedule/duration.ts',
    'src/store/ledger.ts',
    'src/store/lock.ts',
    'src/providers/provider.ts',
    'src/providers/gmail.ts',
    'src/providers/calendar.ts',
    'src/providers/openai.ts',
    'src/providers/extractor.ts',
    'src/providers/mock.ts',
    'src/model.ts',
    'src/config.ts',
    'src/log.ts',
  ],
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  sourcemap: true,
  clean: true,
  dts: true,
  splitting: true,
  async onSuccess() {
    // shebang on the CLI entry only
    const cliPath = 'dist/cli.js';
    const content = readFileSync(cliPath, 'utf8');
    if (!content.startsWith('#!')) {
      writeFileSync(cliPath, '#!/usr/bin/env node\n' + content);
    }
  },
});
