import { promptSelect } from '../terminal/prompt-select.js';

export type ModeSelector = (modes: string[]) => Promise<string>;

export const selectModeInteractively: ModeSelector = (modes) =>
  promptSelect(
    'Choose a power mode',
    modes.map((mode) => ({ value: mode, label: mode })),
  );
