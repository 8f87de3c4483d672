/**
 * Named integration points.
 *
 * Embedding programs fire these from their own lifecycle; the execution
 * context fires the namespace pair and the context-level names itself.
 */

export const HookPoints = {
  PRE_NAMESPACE_EXECUTE: 'cuemark.pre_namespace_execute',
  POST_NAMESPACE_EXECUTE: 'cuemark.post_namespace_execute',
  PRE_TOOL_EXECUTE: 'cuemark.pre_tool_execute',
  POST_TOOL_EXECUTE: 'cuemark.post_tool_execute',
  TOOL_RESULT_FILTER: 'cuemark.tool_result_filter',
  PRE_AGENT_EXECUTE: 'cuemark.pre_agent_execute',
  POST_AGENT_EXECUTE: 'cuemark.post_agent_execute',
  PRE_LLM_CALL: 'cuemark.pre_llm_call',
  POST_LLM_CALL: 'cuemark.post_llm_call',
  LLM_RESPONSE_FILTER: 'cuemark.llm_response_filter',
} as const;

export type HookPoint = (typeof HookPoints)[keyof typeof HookPoints];

/** Lifecycle names used by every ExecutionContext on its own registry. */
export const ContextHooks = {
  BEFORE_EXECUTE: 'before_execute',
  AFTER_EXECUTE: 'after_execute',
  RESULT_FILTER: 'result',
} as const;

/** Hooks whose callbacks cannot be removed without the removal token. */
export const CRITICAL_HOOKS: ReadonlySet<string> = new Set<string>([
  HookPoints.PRE_NAMESPACE_EXECUTE,
  HookPoints.POST_NAMESPACE_EXECUTE,
]);
