import { loadConfig } from './config';
import { createRuntime } from './runtime';
import { createRequirementsAnalysisWorkflow } from './workflows';

const TAG = "[stepweave]";

const runtime = createRuntime(loadConfig());
runtime.engine.register(createRequirementsAnalysisWorkflow());

async function main() {
  await runtime.start();
  console.log(`${TAG} workflows: ${runtime.engine.listWorkflows().join(", ")}`);
}

async function shutdown(signal: string) {
  console.log(`${TAG} ${signal} received, shutting down...`);
  await runtime.shutdown();
  process.exit(0);
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));

main().catch((err) => {
  console.error(`${TAG} fatal:`, err);
  process.exit(1);
});
