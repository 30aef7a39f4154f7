// apps/api/src/server.ts
import "./boot";

import { createLog, errMessage } from "@orcha/utils";
import { createServices, loadConfig } from "@orcha/core";
import { createPulseService, PulseScheduler } from "@orcha/pulse";
import { closeRedis, startOcrWorker } from "@orcha/ocr";
import { createApp } from "./app";

async function main() {
  const config = loadConfig();
  const log = createLog("api", { verbose: config.verbose });
  const services = await createServices(config, { log: createLog("core", { verbose: config.verbose }) });
  const pulse = createPulseService(services);

  const stops: Array<() => void> = [];

  if (config.pulse.enabled) {
    const scheduler = new PulseScheduler(pulse, services.pulses, {
      cron: config.pulse.cron,
      checkCron: config.pulse.checkCron,
      log: log.child({ tag: "pulse-scheduler" }),
    });
    stops.push(await scheduler.start());
  }

  if (services.queue && config.redis.ocrWorkerEnabled) {
    stops.push(startOcrWorker(services.queue, services.ocr, { log: log.child({ tag: "ocr-worker" }) }));
    log.info("OCR worker started");
  }

  const app = createApp({ ...services, pulse, log });
  const server = app.listen(config.api.port, () => {
    log.info(`API listening on http://localhost:${config.api.port}`);
  });

  const shutdown = (sig: string) => {
    log.info(`${sig} received, shutting down`);
    for (const stop of stops) stop();
    server.close(() => {
      closeRedis().then(
        () => process.exit(0),
        (e: unknown) => {
          log.error("closing redis failed:", errMessage(e));
          process.exit(1);
        },
      );
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((e: unknown) => {
  console.error("[api] fatal:", errMessage(e));
  process.exit(1);
});
