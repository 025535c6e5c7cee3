import { hostname, networkInterfaces } from 'os';

export interface NetworkAddress {
  interface: string;
  address: string;
  family: 'IPv4' | 'IPv6';
}

export interface NetworkInfo {
  hostname: string;
  local: string | null;
  tailscale_ip: string | null;
  urls: string[];
}

export function getLocalNetworkAddresses(): NetworkAddress[] {
  const interfaces = networkInterfaces();
  const addresses: NetworkAddress[] = [];

  for (const [name, netInterfaces] of Object.entries(interfaces)) {
    if (!netInterfaces) {
      continue;
    }

    for (const net of netInterfaces) {
      if (net.internal) {
        continue;
      }

      if (net.family === 'IPv4') {
        addresses.push({
          interface: name,
          address: net.address,
          family: 'IPv4',
        });
      }
    }
  }

  return addresses;
}

/**
 * Tailscale hands out addresses from the carrier-grade NAT block 100.64.0.0/10.
 */
export function isTailscaleAddress(address: string): boolean {
  const octets = address.split('.').map((part) => Number(part));

  if (octets.length !== 4 || octets.some((octet) => !Number.isInteger(octet))) {
    return false;
  }

  const [first, second] = octets;
  return first === 100 && second !== undefined && second >= 64 && second <= 127;
}

export function formatAccessibleUrls(host: string, port: number): string[] {
  const urls: string[] = [];

  if (host === '0.0.0.0' || host === '::') {
    urls.push(`http://localhost:${port}`);

    const networkAddresses = getLocalNetworkAddresses();

    for (const addr of networkAddresses) {
      urls.push(`http://${addr.address}:${port}`);
    }
  } else if (host === 'localhost' || host === '127.0.0.1') {
    urls.push(`http://localhost:${port}`);
  } else {
    urls.push(`http://${host}:${port}`);
  }

  return urls;
}

/**
 * Addresses an operator can use to reach the control server.
 * The LAN address skips Tailscale's interface so the two are reported apart.
 */
export function getNetworkInfo(host: string, port: number): NetworkInfo {
  const addresses = getLocalNetworkAddresses();
  const tailscale = addresses.find((addr) => isTailscaleAddress(addr.address));
  const local = addresses.find((addr) => !isTailscaleAddress(addr.address));

  return {
    hostname: hostname(),
    local: local ? local.address : null,
    tailscale_ip: tailscale ? tailscale.address : null,
    urls: formatAccessibleUrls(host, port),
  };
}
