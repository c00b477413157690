/**
 * The MCP stdio transport owns stdout. console.log/info/debug are sent to
 * stderr instead so that a stray log line cannot corrupt a JSON-RPC frame.
 */

function toStderr(...args: unknown[]): void {
  console.error(...args);
}

export function routeConsoleToStderr(): void {
  console.log = toStderr;
  console.info = toStderr;
  console.debug = toStderr;
}
