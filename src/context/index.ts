export { ExecutionContext } from './ExecutionContext.js';

export type {
  ContainerHandler,
  ExecutionContextOptions,
  ExecutionRecord,
  Kwargs,
  NamespaceCallInfo,
  TagHandler,
} from './ExecutionContext.js';
