export type RelayAddress = {
  host: string;
  port: number;
};

const LOOPBACK_HOSTS = new Set(["127.0.0.1", "localhost", "::1", "[::1]"]);

/**
 * Accepts `host:port` or `http://host:port`. Port 0 is allowed so a listener
 * can bind an ephemeral port.
 */
export function parseRelayAddress(input: string): RelayAddress {
  const trimmed = input.trim();
  if (!trimmed) {
    throw new Error("relay address is empty");
  }

  const candidate = /^[a-z]+:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
  let url: URL;
  try {
    url = new URL(candidate);
  } catch {
    throw new Error(`relay address "${input}" is not host:port`);
  }

  if (url.protocol !== "http:") {
    throw new Error(`relay address "${input}" must use http`);
  }
  if (url.pathname !== "/" || url.search || url.hash) {
    throw new Error(`relay address "${input}" must not carry a path`);
  }
  // URL drops the scheme's default port, so read it from the input itself.
  const explicitPort = /:(\d{1,5})\/?$/.exec(trimmed);
  if (!explicitPort) {
    throw new Error(`relay address "${input}" has no port`);
  }
  const port = Number(explicitPort[1]);
  if (port > 65_535) {
    throw new Error(`relay address "${input}" has an invalid port`);
  }

  const host = url.hostname.startsWith("[") ? url.hostname.slice(1, -1) : url.hostname;
  return { host, port };
}

export const isLoopbackHost = (host: string): boolean => LOOPBACK_HOSTS.has(host);

export function relayBaseUrl(address: RelayAddress): string {
  const host = address.host.includes(":") ? `[${address.host}]` : address.host;
  return `http://${host}:${address.port}`;
}
