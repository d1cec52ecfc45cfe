import debug from 'debug'
import * as dgram from 'node:dgram'
import { isIP } from 'node:net'
import os, { type NetworkInterfaceInfo } from 'node:os'
import * as _ from 'radash'
import { safeSyncTry, safeTry } from './safe.js'

const log = debug('framelink:net')

const FAMILIES = { 4: 'IPv4', 6: 'IPv6' } as const

/** Well-known public address used only to pick the outbound interface. */
export const ROUTE_TARGET_ADDRESS = '8.8.8.8'
export const ROUTE_TARGET_PORT = 80
export const LOOPBACK_ADDRESS = '127.0.0.1'

export function isLinkLocalIp(ip: string): boolean {
  if (ip.startsWith('169.254.')) {
    return true
  }

  if (ip.toLowerCase().startsWith('fe80')) {
    return true
  }

  return false
}

export function isIpAddress(value: string): boolean {
  return isIP(value) !== 0
}

export function isWildcard(ip: string): boolean {
  return ['0.0.0.0', '::'].includes(ip)
}

/**
 * Non-internal, non link-local addresses of the given family on this host.
 */
export function getNetworkAddrs(
  family: 4 | 6,
  networks: NodeJS.Dict<NetworkInterfaceInfo[]> = os.networkInterfaces(),
): string[] {
  const addresses: string[] = []

  for (const [, netAddrs] of Object.entries(networks)) {
    if (netAddrs == null) continue

    for (const netAddr of netAddrs) {
      if (netAddr.internal || isLinkLocalIp(netAddr.address)) {
        continue
      }

      if (netAddr.family === FAMILIES[family]) {
        addresses.push(netAddr.address)
      }
    }
  }

  return addresses
}

/**
 * Local address of the interface the kernel would route `ROUTE_TARGET_ADDRESS`
 * through. Connecting a UDP socket sends nothing on the wire.
 */
export async function lookupRouteAddress(
  createSocket: () => dgram.Socket = () => dgram.createSocket('udp4'),
): Promise<string> {
  const socket = createSocket()
  try {
    await new Promise<void>((resolve, reject) => {
      socket.once('error', reject)
      socket.connect(ROUTE_TARGET_PORT, ROUTE_TARGET_ADDRESS, () => {
        socket.off('error', reject)
        resolve()
      })
    })
    return socket.address().address
  } finally {
    safeSyncTry(() => socket.close())
  }
}

export interface ResolveLocalAddressOptions {
  routeLookup?: () => Promise<string>
  networks?: () => NodeJS.Dict<NetworkInterfaceInfo[]>
}

/**
 * Address of this host usable as a default bind/connect address.
 *
 * Tries the routing lookup first, then the first external IPv4 interface,
 * and finally loopback. Never rejects.
 */
export async function resolveLocalAddress(
  options: ResolveLocalAddressOptions = {},
): Promise<string> {
  const routeLookup = options.routeLookup ?? (() => lookupRouteAddress())
  const [routeError, routed] = await safeTry(routeLookup)

  if (routeError === undefined && !isWildcard(routed) && isIpAddress(routed)) {
    return routed
  }
  log(
    'route lookup failed (%s), falling back to interface list',
    routeError?.message ?? routed,
  )

  const networks = options.networks ?? (() => os.networkInterfaces())
  const [networksError, addrs] = await safeTry(async () =>
    getNetworkAddrs(4, networks()),
  )
  if (networksError !== undefined) {
    log('interface lookup failed: %s', networksError.message)
  }

  return _.first(addrs ?? []) ?? LOOPBACK_ADDRESS
}
