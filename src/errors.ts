export type HostAddrErrorCode =
  | "E_ENUMERATION_FAILED"
  | "E_INTERFACE_NOT_FOUND"
  | "E_INVALID_ADDRESS";

export class HostAddrError extends Error {
  readonly code: HostAddrErrorCode;

  constructor(code: HostAddrErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.code = code;
    this.name = "HostAddrError";
  }
}
