import type { FastifyInstance } from "fastify";
import { logInfo, logWarn } from "../observability/logger.js";

type ClientHealth = { status: "ok" | "error"; details?: string };

export interface ManagedClient {
  name: string;
  connect: () => Promise<{ healthCheck: () => Promise<ClientHealth> }>;
  shutdown: () => Promise<void>;
}

let processHooksRegistered = false;

async function loadManagedClients(): Promise<ManagedClient[]> {
  const [openaiModule, postgresModule, qdrantModule] = await Promise.all([
    import("./openai.js"),
    import("./postgres.js"),
    import("./qdrant.js")
  ]);

  return [
    { name: "postgres", connect: postgresModule.getPostgresClient, shutdown: postgresModule.shutdownPostgresClient },
    { name: "openai", connect: openaiModule.getOpenAIClient, shutdown: openaiModule.shutdownOpenAIClient },
    { name: "qdrant", connect: qdrantModule.getQdrantClient, shutdown: qdrantModule.shutdownQdrantClient }
  ];
}

async function shutdownAll(source: string, clients: ManagedClient[]): Promise<void> {
  logInfo("lifecycle.shutdown", {}, { source, clients: clients.map((client) => client.name) });
  const results = await Promise.allSettled(clients.map((client) => client.shutdown()));
  results.forEach((result, index) => {
    if (result.status === "rejected") {
      logWarn("lifecycle.shutdown_failed", {}, {
        client: clients[index]?.name ?? "unknown",
        error: result.reason instanceof Error ? result.reason.message : String(result.reason)
      });
    }
  });
}

export interface ClientLifecycleOptions {
  enableBootstrap?: boolean;
  loadClients?: () => Promise<ManagedClient[]>;
  registerProcessSignals?: boolean;
  exit?: (code: number) => void;
}

/**
 * Connects and health-checks every infrastructure client when the app is
 * ready, and closes them on app close or SIGINT/SIGTERM.
 */
export function registerClientLifecycle(app: FastifyInstance, options: ClientLifecycleOptions = {}): void {
  if (!options.enableBootstrap) {
    logInfo("lifecycle.bootstrap_disabled", {}, { hint: "set ENABLE_INFRA_BOOTSTRAP=true to enable" });
    return;
  }
  const loadClients = options.loadClients ?? loadManagedClients;
  const exit = options.exit ?? ((code: number) => process.exit(code));

  app.addHook("onReady", async () => {
    const clients = await loadClients();
    const health = await Promise.all(
      clients.map(async (client) => ({ name: client.name, ...(await (await client.connect()).healthCheck()) }))
    );
    const unhealthy = health.filter((entry) => entry.status !== "ok");
    if (unhealthy.length > 0) {
      logWarn("lifecycle.unhealthy_clients", {}, { clients: unhealthy });
    }
    logInfo("lifecycle.ready", {}, { clients: health.map((entry) => entry.name) });
  });

  app.addHook("onClose", async () => {
    await shutdownAll("onClose", await loadClients());
  });

  if ((options.registerProcessSignals ?? true) && !processHooksRegistered) {
    processHooksRegistered = true;
    const handleSignal = async (signal: NodeJS.Signals): Promise<void> => {
      await shutdownAll(signal, await loadClients());
      exit(0);
    };

    for (const signal of ["SIGINT", "SIGTERM"] as const) {
      process.once(signal, () => {
        handleSignal(signal).catch((error: unknown) => {
          logWarn("lifecycle.signal_handler_failed", {}, {
            signal,
            error: error instanceof Error ? error.message : String(error)
          });
          exit(1);
        });
      });
    }
  }
}

export function resetClientLifecycleStateForTests(): void {
  processHooksRegistered = false;
}
