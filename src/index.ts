export * from "./types/index.js";
export { HadoopError, HadoopErrorCode, ConfigError, CommandError, WaitTimeoutError, SpecMismatchError, HaStateError } from "./errors.js";
export { logger } from "./logger.js";
export { loadConfig } from "./config/loader.js";
export type { ConfigResult } from "./config/loader.js";
export { LocalExecutor, execOrThrow, withTimeoutCeiling } from "./execution/executor.js";
export type { Executor, ExecResult } from "./execution/executor.js";
export { DistConfig, DistDescriptorSchema, REQUIRED_DIRS } from "./dist/dist-config.js";
export type { DistDescriptor, DirSpec, OptionSource, Provisioner } from "./dist/dist-config.js";
export {
  PropertyMap, editPropertyFile, readPropertyFile, parsePropertyXml, serializePropertyXml, mergeProperties,
} from "./edit/property-file.js";
export type { PropertyEntry, PropertyValue } from "./edit/property-file.js";
export { editEnvironmentFile, readEtcEnv, parseEnvironment, serializeEnvironment } from "./edit/environment-file.js";
export { reEditInPlace } from "./edit/line-pattern.js";
export type { LinePatternOptions } from "./edit/line-pattern.js";
export { FlagStore } from "./state/flag-store.js";
export type { FlagValue } from "./state/flag-store.js";
export { HadoopBase, BASE_FLAGS } from "./hadoop/hadoop-base.js";
export type { NodeContext, JavaInfo, InstallOptions } from "./hadoop/hadoop-base.js";
export { HDFS, HDFS_PROCESS_NAMES } from "./hadoop/hdfs.js";
export type { HdfsDaemon } from "./hadoop/hdfs.js";
export { YARN, YARN_PROCESS_NAMES, YARN_FLAGS } from "./hadoop/yarn.js";
export type { YarnDaemon, ResourceManagerEndpoint } from "./hadoop/yarn.js";
export { HaCoordinator, HA_STATES, HA_FLAGS } from "./hadoop/ha-coordinator.js";
export type { HaState, BootstrapResult, EnsureActiveResult } from "./hadoop/ha-coordinator.js";
export { runAs, jps, shellQuote } from "./hadoop/process.js";
export { pollUntil, waitForConnect, waitForProcess, checkConnect } from "./hadoop/wait.js";
export type { PollOptions } from "./hadoop/wait.js";
export { specMatches, parseSpec } from "./relations/spec.js";
export type { Spec } from "./relations/spec.js";
export { filteredData, isReady, provideData, resolveSpec, InMemoryRelationData } from "./relations/relation.js";
export type { Relation, ProviderRelation, ConsumerRelation, RelationData, UnitData, SpecSource, ProvideContext } from "./relations/relation.js";
export * as relations from "./relations/catalog.js";
export {
  updateEtcHosts, manageEtcHosts, getKvHosts, updateKvHosts, updateKvHost, removeKvHosts, resolvePrivateAddress, MANAGED_MARKER,
} from "./hosts/etc-hosts.js";
export { createPluginContext } from "./bootstrap.js";
