export { LanController } from "./lan/controller.js";
export type { LanControllerOptions } from "./lan/controller.js";
export {
  BROADCAST_ADDRESS,
  BROADCAST_PORT,
  COMMAND_PORT,
  LISTENING_PORT,
  DISCOVERY_INTERVAL_MS,
  EVICT_INTERVAL_MS,
  UPDATE_INTERVAL_MS,
} from "./lan/controller.js";
export { LanDevice } from "./lan/device.js";
export type { DeviceCommands, DeviceSnapshot, UpdateHandler } from "./lan/device.js";
export { DeviceRegistry } from "./lan/registry.js";
export type { DiscoveredHandler, EvictedHandler } from "./lan/registry.js";
export { TransportManager, LanEndpoint } from "./lan/transport.js";
export type { UdpSocket } from "./lan/transport.js";
export {
  CommandExecutor,
  BACKOFF_SCHEDULE_MS,
  DEFAULT_MAX_RETRIES,
  STATUS_REQUEST_DELAY_MS,
} from "./lan/command-executor.js";
export { CAPABILITY_TABLE, LightFeature, ON_OFF_CAPABILITIES, hasFeature, lookupCapabilities } from "./lan/capabilities.js";
export type { LightCapabilities, CapabilityLookup } from "./lan/capabilities.js";
export * from "./lan/messages.js";
export type * from "./lan/types.js";
export { WILDCARD_ADDRESS } from "./lan/types.js";
export { ConfigurationError, DeviceDetachedError, DeviceNotFoundError } from "./util/errors.js";
export { createLogger } from "./util/logger.js";
export type { Logger } from "./util/logger.js";
export { LanAdapter } from "./adapters/lan.js";
export { createServer } from "./server.js";
