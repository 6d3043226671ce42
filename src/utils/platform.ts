/**
 * Whether this Node.js runtime was built with TLS support.
 */
export function isTlsSupported(): boolean {
  return typeof process.versions.openssl === "string" && process.versions.openssl.length > 0;
}
