import { loadConfig } from "../src/config.js";
import { runCheck } from "../src/monitor.js";
import { createMailTransport } from "../src/notifier.js";
import { BrowserPageFetcher } from "../src/scraper.js";
import { JsonStateStore } from "../src/state-store.js";

async function main(): Promise<number> {
  const config = loadConfig(process.env);

  if (config.mail.kind === "disabled") {
    console.warn(`Email notifications disabled: ${config.mail.reason}`);
  } else {
    console.log(`Email recipients: ${config.mail.recipients.length}`);
  }

  const result = await runCheck({
    config,
    store: new JsonStateStore(config.stateDir),
    fetcher: new BrowserPageFetcher({
      navigationTimeoutMs: config.navigationTimeoutMs,
      settleDelayMs: config.settleDelayMs,
      chromiumPath: config.chromiumPath,
    }),
    transport: createMailTransport(config.mail),
  });

  return result.exitCode;
}

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
