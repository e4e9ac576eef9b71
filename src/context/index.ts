export {
  Context,
  ContextKey,
  background,
  createContextKey,
  withCancel,
  withDeadline,
  withTimeout,
  withValue,
} from './context.js';
export type { CancelFunc } from './context.js';
