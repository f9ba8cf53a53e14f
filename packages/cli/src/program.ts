import { Command, type HelpConfiguration } from 'commander';
import pc from 'picocolors';
import { registerConvertCommand } from './commands/convert.js';
import { registerInspectCommand } from './commands/inspect.js';
import { registerProceduralCommand } from './commands/procedural.js';

export const VERSION = '0.1.0';

const name = (str: string): string => pc.green(str);
const flag = (str: string): string => pc.yellow(str);
const prose = (str: string): string => pc.dim(str);

/** Commands in green, flags and arguments in yellow, descriptions dimmed. */
const HELP_STYLES: HelpConfiguration = {
  helpWidth: 80,
  showGlobalOptions: false,
  styleTitle: (str) => pc.bold(pc.cyan(str)),
  styleUsage: flag,
  styleCommandText: name,
  styleSubcommandTerm: name,
  styleOptionTerm: flag,
  styleArgumentTerm: flag,
  styleCommandDescription: prose,
  styleSubcommandDescription: prose,
  styleOptionDescription: prose,
  styleArgumentDescription: prose,
};

function banner(): string {
  return `\n  ${pc.bold(pc.cyan('cvsql'))} ${pc.dim(`v${VERSION}`)}\n`;
}

// ── Program setup ───────────────────────────────────────────────────

export function createProgram(): Command {
  const program = new Command('cvsql')
    .description('Calculation View XML to SQL and procedural code')
    .version(VERSION)
    .configureHelp(HELP_STYLES)
    .addHelpText('before', banner());

  registerConvertCommand(program);
  registerProceduralCommand(program);
  registerInspectCommand(program);

  return program;
}
