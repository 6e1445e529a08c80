// Command Pattern exports
export type { Command, CommandContext, CommandOptions } from './Command.js';
export { PointerCommand } from './PointerCommand.js';
export { ClickCommand } from './ClickCommand.js';
export { ActivateCommand } from './ActivateCommand.js';
export { NavigateCommand } from './NavigateCommand.js';
export { CommandExecutor } from './CommandExecutor.js';
export type { FirstSuccessReport } from './CommandExecutor.js';
