export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class DeviceNotFoundError extends Error {
  constructor(readonly deviceId: string) {
    super(`Device not found: ${deviceId}`);
    this.name = "DeviceNotFoundError";
  }
}

export class DeviceDetachedError extends Error {
  constructor(readonly fingerprint: string) {
    super(`Device ${fingerprint} is no longer registered with a controller`);
    this.name = "DeviceDetachedError";
  }
}
