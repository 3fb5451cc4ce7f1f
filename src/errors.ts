/**
 * Client-side problem with the request: missing blocks for the chosen rig,
 * missing coordinates, an empty place name. Rejected before any scoring runs.
 */
export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputError";
  }
}

/** A place name the geocoder could not resolve inside the supported region. */
export class LocationNotFoundError extends InputError {
  constructor(message: string) {
    super(message);
    this.name = "LocationNotFoundError";
  }
}

/**
 * A collaborator (weather, geocoding, routing, reference data) failed,
 * timed out or answered with something unusable.
 */
export class UpstreamError extends Error {
  readonly service: string;

  constructor(service: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "UpstreamError";
    this.service = service;
  }
}
