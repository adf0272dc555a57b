#!/usr/bin/env node

/**
 * orgpress ビルド エントリポイント
 */

import * as path from 'path';
import { ConfigLoader } from '@orgpress/types';
import { FileStorage } from '@orgpress/storage';
import { SiteBuilder } from '../builder/site-builder.js';

async function main(): Promise<void> {
  try {
    // 設定読み込み
    const { config, configPath, projectRoot } = await ConfigLoader.resolve();
    console.log(`Loading config from: ${configPath ?? '(defaults)'}`);

    // ストレージ初期化
    const outputDir = path.resolve(projectRoot, config.storage.outputPath);
    const storage = new FileStorage({ basePath: outputDir, indexFile: config.storage.indexFile });

    const builder = new SiteBuilder({ rootDir: projectRoot, config, storage });
    const report = await builder.build();

    console.log(`Build ${report.buildId} completed`);
    console.log(`  - Project: ${config.project.name || path.basename(projectRoot)}`);
    console.log(`  - Output: ${outputDir}`);
    console.log(`  - Built: ${report.built.length}`);
    console.log(`  - Skipped: ${report.skipped.length}`);
    console.log(`  - Removed: ${report.removed.length}`);
    console.log(`  - Failed: ${report.failed.length}`);

    for (const failure of report.failed) {
      console.error(`  ${failure.path}: ${failure.error.name}: ${failure.error.message}`);
    }

    if (report.failed.length > 0) {
      process.exit(1);
    }
  } catch (error) {
    console.error('Build failed:', error);
    process.exit(1);
  }
}

void main();
