/**
 * Connection options shared by every command
 */

import { Command, Option } from 'commander';
import { DEFAULT_HOST, DEFAULT_RECEIVE_PORT, DEFAULT_REQUEST_TIMEOUT, DEFAULT_SEND_PORT } from '@live-osc/client';

export function addConnectionOptions(cmd: Command): Command {
  return cmd
    .addOption(new Option('-H, --host <host>', `Live host (default: ${DEFAULT_HOST})`).env('LIVE_OSC_HOST'))
    .addOption(
      new Option('-s, --send-port <port>', `Port Live listens on (default: ${DEFAULT_SEND_PORT})`).env(
        'LIVE_OSC_SEND_PORT'
      )
    )
    .addOption(
      new Option('-r, --receive-port <port>', `Port replies arrive on (default: ${DEFAULT_RECEIVE_PORT})`).env(
        'LIVE_OSC_RECEIVE_PORT'
      )
    )
    .addOption(
      new Option('-t, --timeout <ms>', `Request timeout in milliseconds (default: ${DEFAULT_REQUEST_TIMEOUT})`).env(
        'LIVE_OSC_TIMEOUT'
      )
    );
}
