/**
 * Connect, run one command body, disconnect, exit
 */

import type { LiveGateway } from '@live-osc/client';
import type { CliContext } from './context.js';
import { formatError, getExitCode } from './formatting.js';
import { parseConnectionOptions, type ConnectionOptions } from './validation.js';

/**
 * Body of a command, run against a connected gateway
 */
export type Session = (gateway: LiveGateway) => Promise<void>;

/**
 * Runs a command against Live.
 *
 * `prepare` parses the command's arguments and returns the session body; it
 * runs before any socket is opened, so bad input never touches the network.
 * The gateway is disconnected on every path before the exit code is reported.
 */
export async function withGateway(
  ctx: CliContext,
  options: ConnectionOptions,
  prepare: () => Session
): Promise<void> {
  let gateway: LiveGateway | null = null;

  try {
    const config = parseConnectionOptions(options);
    const session = prepare();

    gateway = ctx.createGateway(config);
    await gateway.connect();
    await session(gateway);

    await gateway.disconnect();
    ctx.exit(0);
  } catch (error) {
    ctx.err(formatError(error));

    if (gateway !== null) {
      await disconnectQuietly(ctx, gateway);
    }

    ctx.exit(getExitCode(error));
  }
}

async function disconnectQuietly(ctx: CliContext, gateway: LiveGateway): Promise<void> {
  try {
    await gateway.disconnect();
  } catch (error) {
    ctx.err(`Warning: disconnect failed - ${error instanceof Error ? error.message : String(error)}`);
  }
}
