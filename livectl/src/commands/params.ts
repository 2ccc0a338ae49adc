/**
 * Params command implementation
 */

import { Command } from 'commander';
import { defaultContext, type CliContext } from '../context.js';
import { formatParameters } from '../formatting.js';
import { addConnectionOptions } from '../options.js';
import { withGateway } from '../session.js';
import { parseIndex, type ConnectionOptions } from '../validation.js';

/**
 * Create the params command
 */
export function createParamsCommand(ctx: CliContext = defaultContext): Command {
  const cmd = new Command('params');

  addConnectionOptions(cmd)
    .description('List the parameters of a device')
    .argument('<track>', 'Track index')
    .argument('<device>', 'Device index on the track')
    .action(async (trackArg: string, deviceArg: string, options: ConnectionOptions) =>
      withGateway(ctx, options, () => {
        const track = parseIndex('track', trackArg);
        const device = parseIndex('device', deviceArg);

        return async (gateway) => {
          for (const line of formatParameters(await gateway.getDeviceParameters(track, device))) {
            ctx.out(line);
          }
        };
      })
    );

  return cmd;
}
