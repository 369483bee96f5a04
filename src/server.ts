import { join } from 'node:path';
import { loadConfig, createLogger, FileArtifactStore, FileFeedbackStore } from './infrastructure/index.js';
import { startServer } from './interfaces/http/index.js';

/**
 * Review API entry point. Serves the artifacts found in
 * TRIAGE_OUTPUT_DIR; run the pipeline to populate them.
 */
async function main(): Promise<void> {
  const { config, warnings } = loadConfig();
  const log = createLogger(config.logLevel);
  for (const warning of warnings) log.warn(warning);

  await startServer(
    {
      artifacts: new FileArtifactStore(config.outputDir, log),
      feedback: new FileFeedbackStore(join(config.outputDir, 'feedback.json'), log),
    },
    { host: config.server.host, port: config.server.port, logLevel: config.logLevel },
  );
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
