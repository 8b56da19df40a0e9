import { loadDotenv, parseConfig } from "./src/config/env";
import { EXIT_CODES, describeError } from "./src/errors";
import { runReportJob } from "./src/job";
import { setLogLevel } from "./src/logger";
import { TwilioWhatsAppNotifier } from "./src/notify/twilio";

loadDotenv();

async function main(): Promise<number> {
  const config = parseConfig(process.env);
  setLogLevel(config.logLevel);

  const outcome = await runReportJob({
    config,
    notifier: new TwilioWhatsAppNotifier(config.twilio)
  });
  return outcome.exitCode;
}

process.on("unhandledRejection", (reason: unknown) => {
  console.error("Unhandled promise rejection", reason);
  process.exitCode = EXIT_CODES.fatal;
});

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error(`ERROR: ${describeError(error)}`);
    process.exitCode = EXIT_CODES.fatal;
  });
