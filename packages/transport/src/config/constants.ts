export const DEFAULT_PORT = 1024
export const DEFAULT_POLL_TIMEOUT_MS = 100
export const DEFAULT_BACKLOG = 128
export const DEFAULT_CONNECT_TIMEOUT_MS = 10_000

/** Largest UDP payload over IPv4: 65535 - 8 byte UDP header - 20 byte IP header. */
export const MAX_UDP_PAYLOAD = 65_507
export const DEFAULT_MAX_PENDING_DATAGRAMS = 1024

export const MIN_PORT = 0
export const MAX_PORT = 65_535
