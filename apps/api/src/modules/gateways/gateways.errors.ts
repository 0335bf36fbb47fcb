export class GatewayNotFoundError extends Error {
  constructor(public readonly gatewayId: string) {
    super(`Gateway ${gatewayId} not found`);
    this.name = "GatewayNotFoundError";
  }
}

export class GatewayInactiveError extends Error {
  constructor(public readonly gatewayId: string) {
    super(`Gateway ${gatewayId} is not active`);
    this.name = "GatewayInactiveError";
  }
}

/** Gateway configuration that cannot be stored or used as given. */
export class InvalidConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidConfigError";
  }
}
