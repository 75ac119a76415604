/**
 * Status codes of the admin console protocol (the CLIS_* values in varnishd).
 */
export const STATUS = {
  SYNTAX: 100,
  UNKNOWN: 101,
  UNIMPLEMENTED: 102,
  TOO_FEW: 104,
  TOO_MANY: 105,
  PARAM: 106,
  /** Authentication challenge; only valid as the banner */
  AUTH: 107,
  OK: 200,
  TRUNCATED: 201,
  CANT: 300,
  COMMS: 400,
  /** Acknowledgement of `quit` */
  CLOSE: 500,
} as const;

export type StatusCode = (typeof STATUS)[keyof typeof STATUS];
