/**
 * Startup Banner
 * Prints where the control server can be reached, with a QR code for phones
 */

import * as qrcode from 'qrcode-terminal';
import { NetworkInfo } from './network';

export const DEFAULT_API_KEY = 'CHANGE_ME_TO_SOMETHING_RANDOM_1234567890';

const API_KEY_PREVIEW_LENGTH = 8;

export interface StartupBannerOptions {
  version: string;
  port: number;
  apiKey: string;
  network: NetworkInfo;
}

export function maskApiKey(apiKey: string): string {
  if (apiKey.length <= API_KEY_PREVIEW_LENGTH) {
    return '*'.repeat(apiKey.length);
  }

  return `${apiKey.slice(0, API_KEY_PREVIEW_LENGTH)}...`;
}

export function displayStartupBanner(options: StartupBannerOptions): void {
  const { version, port, apiKey, network } = options;

  const localUrl = `http://${network.local || 'localhost'}:${port}`;
  const tailscaleUrl = network.tailscale_ip ? `http://${network.tailscale_ip}:${port}` : 'N/A';

  const separator = '═'.repeat(60);
  const thinSeparator = '─'.repeat(60);

  console.log('');
  console.log(separator);
  console.log(`  LLM Launcher Control Server v${version}`);
  console.log(separator);
  console.log('');
  console.log(`  Local:      ${localUrl}`);
  console.log(`  Tailscale:  ${tailscaleUrl}`);
  console.log(`  Host:       ${network.hostname}`);
  console.log('');
  console.log(`  API Key:    ${maskApiKey(apiKey)}`);
  console.log('');
  console.log(thinSeparator);
  console.log('  Scan to open the control panel:');
  console.log('');

  qrcode.generate(localUrl, { small: true }, (qr: string) => {
    const indentedQr = qr
      .split('\n')
      .map(line => '  ' + line)
      .join('\n');
    console.log(indentedQr);
  });

  console.log('');
  console.log('  Press Ctrl+C to stop');
  console.log(separator);
  console.log('');

  if (apiKey === DEFAULT_API_KEY) {
    console.warn('  WARNING: Using default API key! Edit config.json to set a secure key.\n');
  }
}
