/* eslint-disable prefer-top-level-await */
import "ts-node/register/transpile-only";
import { loadDotenv, parseConfig } from "../../src/config/env";
import { resolvePayload } from "../../src/events/payload";
import { normalizeMatches } from "../../src/matches/normalization";
import { involvesNation } from "../../src/report/nation";

async function main() {
  loadDotenv();
  const [eventIdArg, nationArg] = process.argv.slice(2);
  const eventId = eventIdArg?.replace(/\D/g, "");

  if (!eventId) {
    console.error("Usage: ts-node scripts/manual/fetchEventPayload.ts <eventId> [nation]");
    process.exit(1);
  }

  const config = parseConfig(process.env);
  const nation = (nationArg ?? config.targetNation).toUpperCase();

  const payload = await resolvePayload(eventId, {
    staticRoot: config.endpoints.staticRoot,
    liveApi: config.endpoints.liveApi,
    tiers: config.payload.tiers,
    takes: config.payload.takes
  });
  const matches = normalizeMatches(payload).filter((match) => involvesNation(match, nation));

  console.log(JSON.stringify(matches, null, 2));
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
