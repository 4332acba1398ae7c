/**
 * Temporal client factory shared by the reminder manager and the dispatch CLI.
 */

import { Client, Connection } from "@temporalio/client";

export interface TemporalConfig {
  address: string;
  namespace: string;
  taskQueue: string;
}

export async function createTemporalClient(config: TemporalConfig): Promise<Client> {
  console.log(`[temporal] Connecting to Temporal at ${config.address}...`);
  const connection = await Connection.connect({ address: config.address });
  return new Client({ connection, namespace: config.namespace });
}
