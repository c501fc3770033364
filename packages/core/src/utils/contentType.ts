/**
 * Returns true if the header contains `token` (lowercase) delimited by space, comma, tab
 * or `+`, compared case-insensitively. `application/grpc+proto` contains
 * `application/grpc`; `application/grpc-web` does not.
 */
export function hasToken(header: string, token: string): boolean {
  if (token === '' || token.length > header.length) {
    return false;
  }
  return header
    .toLowerCase()
    .split(/[ ,\t+]/)
    .includes(token);
}
