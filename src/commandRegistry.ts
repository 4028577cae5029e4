import type { Command } from 'commander';

import { registerGetCommand } from '@/commands/get.js';
import { registerKeygenCommand } from '@/commands/keygen.js';
import { registerRegisterCommand } from '@/commands/register.js';
import { registerRemoveCommand } from '@/commands/remove.js';
import { registerSetCommand } from '@/commands/set.js';
import { registerSourcesCommand } from '@/commands/sources.js';
import { registerUnregisterCommand } from '@/commands/unregister.js';

/**
 * Command registration function type
 */
export type CommandRegistrar = (program: Command) => void;

/**
 * Helper to add a command group
 */
const addCommandGroup = (groupName: string): CommandRegistrar => {
  return (program: Command) => {
    program.commandsGroup(groupName);
  };
};

/**
 * Registry of all CLI commands with grouping
 * Order matters: groups organize commands in help output
 */
export const commandRegistry: CommandRegistrar[] = [
  addCommandGroup('Account:'),
  registerKeygenCommand,
  registerRegisterCommand,
  registerUnregisterCommand,

  addCommandGroup('Passwords:'),
  registerSourcesCommand,
  registerGetCommand,
  registerSetCommand,
  registerRemoveCommand,
];
