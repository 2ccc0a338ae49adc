/**
 * livectl command tree
 */

import { Command } from 'commander';
import { defaultContext, type CliContext } from './context.js';
import { createStatusCommand } from './commands/status.js';
import { createTempoCommand } from './commands/tempo.js';
import { createPlayCommand, createStopCommand } from './commands/transport.js';
import { createTracksCommand } from './commands/tracks.js';
import { createNotesCommand } from './commands/notes.js';
import { createParamsCommand } from './commands/params.js';

export function createProgram(ctx: CliContext = defaultContext): Command {
  const program = new Command();

  program.name('livectl').version('0.1.0').description('livectl - control Ableton Live over OSC');

  // Register commands
  program.addCommand(createStatusCommand(ctx));
  program.addCommand(createTempoCommand(ctx));
  program.addCommand(createPlayCommand(ctx));
  program.addCommand(createStopCommand(ctx));
  program.addCommand(createTracksCommand(ctx));
  program.addCommand(createNotesCommand(ctx));
  program.addCommand(createParamsCommand(ctx));

  return program;
}
