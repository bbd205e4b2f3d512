#!/usr/bin/env node
import 'dotenv/config';
import { parseArgs, USAGE } from './config.js';
import { exportSite } from './exporter.js';
import { ConfigError, isTypedError } from './errors.js';

async function main(): Promise<number> {
  const { seedUrl, help, config } = parseArgs(process.argv.slice(2));
  if (help || !seedUrl) {
    console.error(USAGE);
    return help ? 0 : 1;
  }

  const controller = new AbortController();
  const onSignal = () => {
    console.error('[export] interrupted, cancelling outstanding requests');
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    const summary = await exportSite(seedUrl, config, process.stdout, { signal: controller.signal });
    console.error(
      `[export] namespaces: ${summary.namespaces}, pages: ${summary.pages}, batches: ${summary.batches}, ` +
        `downloads: ${summary.downloads} (skipped ${summary.skippedDownloads}), failures: ${summary.failures}`
    );
    return 0;
  } catch (err) {
    if (controller.signal.aborted) return 130;
    if (config.strict || !isTypedError(err)) console.error(err);
    else console.error(`[export] ${err.name}: ${err.message}`);
    return 1;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    if (err instanceof ConfigError) console.error(`${err.message}\n\n${USAGE}`);
    else console.error(err);
    process.exit(1);
  });
