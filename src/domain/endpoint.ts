/**
 * Registered downstream destination for webhook forwarding.
 *
 * Field names follow the management API contract (`is_active` is
 * snake_case because the static UI posts and reads it that way).
 * `id` is assigned once by the registry and never changes.
 */
export interface Endpoint {
  readonly id: string;
  readonly name: string;
  readonly url: string;
  readonly is_active: boolean;
}

/** Fields accepted when registering an endpoint (the registry assigns `id`). */
export interface NewEndpoint {
  name: string;
  url: string;
  is_active: boolean;
}
