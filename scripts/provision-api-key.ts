#!/usr/bin/env tsx
/**
 * One-time setup: issues the gateway credential. The response JSON goes to
 * stdout for the deployment tooling; the key itself is never logged.
 *
 *   tsx scripts/provision-api-key.ts > api-key.json
 *   RAG_API_KEYS=$(jq -r .Data.ApiKey api-key.json)
 */
import { Command, Option } from "commander";
import { logger as rootLogger } from "@/lib/logging/logger";
import { handleProvisionEvent, type ProvisionRequestType } from "@/lib/provisioner/api-key";
import { parsePositiveInt, runMain } from "./cli-utils";

type ProvisionOptions = {
  requestType: ProvisionRequestType;
  length: number;
  resourceId?: string;
};

const logger = rootLogger.child({ component: "provision-api-key" });

const program = new Command()
  .name("provision-api-key")
  .description("Generate the API key for the query gateway")
  .addOption(
    new Option("-r, --request-type <type>", "lifecycle event").choices(["Create", "Update", "Delete"]).default("Create")
  )
  .option("-l, --length <n>", "key length", parsePositiveInt, 32)
  .option("--resource-id <id>", "physical resource id to echo back");

async function main() {
  program.parse();
  const opts = program.opts<ProvisionOptions>();
  const response = await handleProvisionEvent(
    { RequestType: opts.requestType, KeyLength: opts.length, PhysicalResourceId: opts.resourceId },
    { logger }
  );
  process.stdout.write(`${JSON.stringify(response)}\n`);
  if (response.Status === "FAILED") process.exitCode = 1;
}

runMain(main, logger);
