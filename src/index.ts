import { loadResponderConfig } from "./config/relay_config";
import { loadProblems } from "./gateway/problem_source";
import { runLocalDebug } from "./local/debug_run";
import { createLogger, describeError } from "./logging/logger";
import { connectRelay } from "./relay/client";
import { baselineSolver, createPredictServer } from "./responder/solver";

const log = createLogger("responder");

async function main() {
  const config = loadResponderConfig(process.env, process.argv.slice(2));
  const server = await createPredictServer(baselineSolver, { log });

  if (!config.scoredRun) {
    log.info(
      { evt: "responder.local_debug", referencePath: config.referencePath },
      "responder.local_debug"
    );
    const { problems, referenceAnswers } = await loadProblems(config.referencePath);
    const report = await runLocalDebug({ server, problems, referenceAnswers, log });
    log.info(
      { evt: "responder.local_debug_done", correct: report.correct, scored: report.scored },
      "responder.local_debug_done"
    );
    return;
  }

  const listener = await connectRelay({
    address: config.address,
    role: "listener",
    log,
    service: "relay-responder",
  });

  const shutdown = (signal: string) => {
    log.info({ evt: "responder.shutdown", signal }, "responder.shutdown");
    server.stop().catch((err: unknown) => {
      log.error({ evt: "responder.shutdown_failed", error: describeError(err) }, "responder.shutdown_failed");
      process.exit(1);
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  await server.serve(listener);
}

main().catch((err) => {
  log.error({ evt: "responder.fatal", error: describeError(err) }, "responder.fatal");
  process.exit(1);
});
