#!/usr/bin/env node
/**
 * lazypull-config CLI
 *
 * Renders a supplemented daemon config from a template. The full config
 * goes to --output (or stdout); logs and the redacted view go to stderr.
 */

// stdout may carry the config itself
console.log = console.error;
console.info = console.error;

import { LazypullError, Labels, SnapshotSupplementInfo } from '@lazypull/core';
import { parseArgs, USAGE } from '../cli/args.js';
import { createDaemonConfig } from '../factory.js';
import { mergeSettings, resolveSupplementSettings, settingsFromEnv } from '../settings.js';
import { DaemonConfigSupplementer } from '../supplement.js';
import { writeDaemonConfig } from '../writer.js';

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args === null) {
    console.error(USAGE);
    return;
  }

  const settings = resolveSupplementSettings(
    mergeSettings(settingsFromEnv(), {
      fsDriver: args.driver,
      templatePath: args.template,
      mirrorsConfigDir: args.mirrorsDir,
    }),
  );

  const config = await createDaemonConfig(settings.fsDriver, settings.templatePath);
  const supplementer = new DaemonConfigSupplementer(settings);

  const labels = args.vpc ? { ...args.labels, [Labels.VPC_REGISTRY]: 'true' } : args.labels;
  await supplementer.supplement(
    config,
    new SnapshotSupplementInfo({
      imageId: args.image,
      snapshotId: args.snapshotId,
      labels,
      params: args.params,
    }),
  );

  if (args.showConfig) {
    console.error(JSON.stringify(config.redact(), null, 2));
  }

  if (args.output) {
    await writeDaemonConfig(config, args.output);
    console.error(`[Lazypull:CLI] Wrote ${settings.fsDriver} daemon config to ${args.output}`);
  } else {
    process.stdout.write(`${config.dumpString()}\n`);
  }
}

main().catch((error: unknown) => {
  if (error instanceof LazypullError) {
    console.error(`[Lazypull:CLI] ${error.message}`);
    if (error.hint) {
      console.error(`  hint: ${error.hint}`);
    }
  } else {
    console.error('[Lazypull:CLI] Error:', error instanceof Error ? error.message : error);
  }
  process.exitCode = 1;
});
