// packages/pulse/src/index.ts
import { fileURLToPath } from "node:url";
import { config as loadEnv } from "dotenv";
import { createLog, errMessage, HOUR_MS } from "@orcha/utils";
import { createServices, loadConfig, type Services } from "@orcha/core";
import { closeRedis } from "@orcha/ocr";
import { PulseService } from "./service";
import { PulseScheduler } from "./scheduler";

export * from "./service";
export * from "./scheduler";

export function createPulseService(services: Services): PulseService {
  const { config } = services;
  return new PulseService({
    conversations: services.conversations,
    pulses: services.pulses,
    chat: services.chat,
    limits: {
      conversations: config.pulse.conversations,
      messageChars: config.pulse.messageChars,
      totalChars: config.pulse.totalChars,
      timeoutMs: config.pulse.timeoutMs,
      intervalMs: config.pulse.intervalHours * HOUR_MS,
    },
    log: createLog("pulse", { verbose: config.verbose }),
  });
}

async function main() {
  loadEnv();
  const config = loadConfig();
  const log = createLog("pulse", { verbose: config.verbose });
  const services = await createServices(config);
  const scheduler = new PulseScheduler(createPulseService(services), services.pulses, {
    cron: config.pulse.cron,
    checkCron: config.pulse.checkCron,
    log,
  });

  if (process.argv.includes("--once")) {
    await scheduler.runAll();
    await closeRedis();
    return;
  }
  await scheduler.start();
  log.info("cron started; press Ctrl+C to exit");
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((e: unknown) => {
    console.error("[pulse] fatal:", errMessage(e));
    process.exit(1);
  });
}
