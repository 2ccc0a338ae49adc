/**
 * Process-facing surface of the CLI
 *
 * Commands only reach the outside world through a CliContext, so tests can
 * run them against a MockTransport and capture output and exit codes.
 */

import { LiveGateway, UdpTransport, createConfig, type GatewayConfigInput } from '@live-osc/client';

export interface CliContext {
  createGateway(config: GatewayConfigInput): LiveGateway;
  out(line: string): void;
  err(line: string): void;
  exit(code: number): void;
}

export const defaultContext: CliContext = {
  createGateway: (input) => {
    const config = createConfig(input);
    return new LiveGateway(config, UdpTransport.fromConfig(config));
  },
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  exit: (code) => process.exit(code),
};
