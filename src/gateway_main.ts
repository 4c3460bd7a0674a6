import { loadGatewayConfig } from "./config/relay_config";
import { solverContracts } from "./contracts/endpoints";
import { GatewayDriver } from "./gateway/driver";
import { loadProblems } from "./gateway/problem_source";
import { createLogger, describeError } from "./logging/logger";
import { RelayClient, connectRelay } from "./relay/client";
import { type CallRecordStore, MemoryCallRecordStore } from "./store/call_record_store";
import { SqliteCallRecordStore } from "./store/sqlite_call_record_store";

const log = createLogger("gateway");

async function main(): Promise<number> {
  const config = loadGatewayConfig(process.env, process.argv.slice(2));
  const { problems, referenceAnswers } = await loadProblems(config.problemsPath);

  const store: CallRecordStore = config.callRecordDbPath
    ? new SqliteCallRecordStore(config.callRecordDbPath)
    : new MemoryCallRecordStore();

  const driver = new GatewayDriver({
    problems,
    referenceAnswers,
    order: config.order,
    deadlineMs: config.deadlineMs,
    resultPath: config.resultsPath,
    store,
    log,
    connect: async () => {
      const dialer = await connectRelay({
        address: config.address,
        role: "dialer",
        backoff: config.backoff,
        log,
      });
      return new RelayClient(dialer, solverContracts);
    },
  });

  try {
    const result = await driver.run();
    return result.state === "DONE" ? 0 : 1;
  } finally {
    await store.close();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err) => {
    log.error({ evt: "gateway.fatal", error: describeError(err) }, "gateway.fatal");
    process.exit(1);
  }
);
