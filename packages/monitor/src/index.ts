export * from "./errors";
export { FleetMonitor, type FleetMonitorOptions, type SnapshotListener } from "./monitor";
export { runDaemon, applyEnvOverrides, type DaemonHandle } from "./main";
export { normalizeInventory, discoverAll, type DiscoveredEntity, type DiscoverySource } from "./inventory";
export { createMonitorLogger, buildLogSinks } from "./observability/logging";
export { ProbeEngine, ProbeTimeoutError, describeProbeError } from "./probe/engine";
export { execFileRunner, type CommandRunner, type CommandResult } from "./probe/commandRunner";
export type { HealthChecker, CheckOutcome, CheckContext } from "./probe/checkers/types";
export { StatusClassifier } from "./status/classifier";
export { UptimeTracker, type ServiceHistory } from "./status/uptime";
export { DependencyGraph } from "./dependency/graph";
export { CascadeCorrelator } from "./dependency/cascade";
export { FailureRateGovernor, type GovernorDecision } from "./recovery/governor";
export { RecoveryController, type Incident, type IncidentPhase } from "./recovery/controller";
export { AlertAggregator, type NotificationHook } from "./alerts/aggregator";
export { ChannelNotifier, formatNotification } from "./alerts/channelNotifier";
export { MaintenanceWindowManager } from "./maintenance/windowManager";
export { StateStore, type StateFileSystem } from "./state/stateStore";
export { emptySnapshot, parseSnapshot, type MonitorStateSnapshot } from "./state/snapshot";
export { ControlServer } from "./control/server";
export { ControlClient, ControlRequestError } from "./control/client";
export { routeControlRequest } from "./control/routes";
