export { InputStateMachine } from './InputStateMachine';
export type { InputOutcome, KeyMode } from './InputStateMachine';
export { COMMANDS, DEFAULT_BINDINGS, chordKeys, isCommandName, loadBindings } from './keymap';
export type { Binding, CommandName } from './keymap';
