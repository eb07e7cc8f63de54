export { SelectionEngine } from './selection-engine.js';
export type {
  CloneLayout,
  SelectionMode,
  SelectionModeKind,
  SelectedFile,
} from './types.js';
