export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProtocolError";
  }
}

/** The fixed-size request header cannot be accepted */
export class MalformedHeaderError extends ProtocolError {
  constructor(message: string) {
    super(message);
    this.name = "MalformedHeaderError";
  }
}

/** The payload does not have the shape its request code requires */
export class MalformedPayloadError extends ProtocolError {
  constructor(message: string) {
    super(message);
    this.name = "MalformedPayloadError";
  }
}
