/**
 * Lists an organization's workspaces and prints the plan log of the latest
 * run in the first one. Expects TFE_TOKEN and TFE_ORGANIZATION to be set.
 */

import {
  Client,
  ConsoleObservability,
  ErrResourceNotFound,
  paginate,
  type Workspace,
} from "../src/public.js";

async function main() {
  const organization = process.env.TFE_ORGANIZATION ?? "";

  // Address and token come from TFE_ADDRESS and TFE_TOKEN.
  const client = await Client.create({
    retryServerErrors: true,
    observability: new ConsoleObservability({ omitMetrics: true }),
  });

  const appName = client.appName() || "Terraform Enterprise";
  console.log(`Connected to ${appName} (API ${client.remoteAPIVersion()})`);

  const workspaces: Workspace[] = [];
  for await (const workspace of paginate((page) => client.workspaces.list(organization, page))) {
    workspaces.push(workspace);
  }
  console.log(`Found ${workspaces.length} workspaces`);

  const first = workspaces[0];
  if (!first) {
    return;
  }

  const runs = await client.runs.list(first.id, { pageSize: 1, include: ["plan"] });
  const planId = runs.items[0]?.plan?.id;
  if (!planId) {
    console.log(`${first.name} has no runs yet`);
    return;
  }

  try {
    const logs = await client.plans.logs(planId);
    for await (const chunk of logs) {
      process.stdout.write(chunk);
    }
  } catch (error) {
    if (error === ErrResourceNotFound) {
      console.error(`plan ${planId} is gone`);
      return;
    }
    throw error;
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
