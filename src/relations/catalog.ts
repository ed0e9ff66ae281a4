// The relations Hadoop nodes exchange. Each factory returns the consumer side by
// default and the provider side when given the provider's collaborators.
import type { ProvideContext, ProviderRelation, Relation, SpecSource } from "./relation.js";
import { isReady } from "./relation.js";

const CLIENT_KEYS = ["private-address", "port", "ready"] as const;
const WORKER_KEYS = ["private-address", "hostname", "hostfqdn"] as const;

export interface HostInfo {
  hostname: string;
  hostfqdn: string;
}

export interface NameNodeProvider {
  port: number;
  /** Resolves once HDFS reports live DataNodes and has left safe mode. */
  waitForHdfs: () => Promise<void>;
}

export interface ResourceManagerProvider {
  port: number;
}

export interface WorkerProvider {
  hostInfo: () => Promise<HostInfo>;
}

function consumer(name: string, requiredKeys: readonly string[], spec?: SpecSource): Relation {
  return { role: "consumer", name, requiredKeys, spec };
}

/** Worker side of `datanode`: advertises the DataNode's hostnames to NameNodes. */
export function dataNode(provider?: WorkerProvider): Relation {
  if (!provider) return consumer("datanode", WORKER_KEYS);
  return workerProvider("datanode", provider);
}

/** Worker side of `nodemanager`: advertises the NodeManager's hostnames to ResourceManagers. */
export function nodeManager(provider?: WorkerProvider): Relation {
  if (!provider) return consumer("nodemanager", WORKER_KEYS);
  return workerProvider("nodemanager", provider);
}

function workerProvider(name: string, provider: WorkerProvider): ProviderRelation {
  return {
    role: "provider",
    name,
    requiredKeys: WORKER_KEYS,
    provide: async () => {
      const { hostname, hostfqdn } = await provider.hostInfo();
      return { hostname, hostfqdn };
    },
  };
}

async function provideNameNode(provider: NameNodeProvider, ctx: ProvideContext): Promise<Record<string, string>> {
  // Clients are told HDFS is ready only once DataNodes have joined and HDFS is usable.
  if (ctx.allReady && (await isReady(dataNode(), ctx.data))) {
    await provider.waitForHdfs();
    return { ready: "true", port: String(provider.port) };
  }
  return {};
}

/** HDFS connection and status info for clients. */
export function nameNode(options: { spec?: SpecSource; provider?: NameNodeProvider } = {}): Relation {
  const { spec, provider } = options;
  if (!provider) return consumer("namenode", CLIENT_KEYS, spec);
  return {
    role: "provider",
    name: "namenode",
    requiredKeys: CLIENT_KEYS,
    spec,
    provide: (ctx) => provideNameNode(provider, ctx),
  };
}

/** The NameNode as seen by DataNodes, over the `datanode` relation. */
export function nameNodeMaster(options: { spec?: SpecSource; provider?: NameNodeProvider } = {}): Relation {
  const { spec, provider } = options;
  if (!provider) return consumer("datanode", CLIENT_KEYS, spec);
  return {
    role: "provider",
    name: "datanode",
    requiredKeys: CLIENT_KEYS,
    spec,
    provide: async (ctx) => {
      const data = await provideNameNode(provider, ctx);
      if (ctx.allReady) data.ready = "true";
      return data;
    },
  };
}

/** YARN connection and status info for clients. */
export function resourceManager(options: { spec?: SpecSource; provider?: ResourceManagerProvider } = {}): Relation {
  const { spec, provider } = options;
  if (!provider) return consumer("resourcemanager", CLIENT_KEYS, spec);
  return {
    role: "provider",
    name: "resourcemanager",
    requiredKeys: CLIENT_KEYS,
    spec,
    provide: async ({ allReady }): Promise<Record<string, string>> => (allReady ? { ready: "true", port: String(provider.port) } : {}),
  };
}

const RM_MASTER_KEYS = ["private-address", "ssh-key", "ready"] as const;

/** The ResourceManager as seen by NodeManagers, over `nodemanager`. Also hands out its SSH public key. */
export function resourceManagerMaster(
  options: { spec?: SpecSource; provider?: ResourceManagerProvider & { sshKey: () => Promise<string> } } = {},
): Relation {
  const { spec, provider } = options;
  if (!provider) return consumer("nodemanager", RM_MASTER_KEYS, spec);
  return {
    role: "provider",
    name: "nodemanager",
    requiredKeys: RM_MASTER_KEYS,
    spec,
    provide: async ({ allReady }) => {
      const data: Record<string, string> = allReady ? { ready: "true", port: String(provider.port) } : {};
      data["ssh-key"] = await provider.sshKey();
      return data;
    },
  };
}

/** Plugins colocated with a client learn when HDFS is usable. */
export function hadoopPlugin(provider?: { waitForHdfs: () => Promise<void> }): Relation {
  const keys = ["private-address", "hdfs-ready"];
  if (!provider) return consumer("hadoop-plugin", keys);
  return {
    role: "provider",
    name: "hadoop-plugin",
    requiredKeys: keys,
    provide: async ({ allReady }): Promise<Record<string, string>> => {
      if (!allReady) return {};
      await provider.waitForHdfs();
      return { "hdfs-ready": "true" };
    },
  };
}

/** The other NameNodes of an HA pair. HA bootstrap waits until peers with a matching spec are known. */
export function nameNodePeers(spec?: SpecSource): Relation {
  return consumer("namenode-peers", ["private-address", "hostname"], spec);
}
