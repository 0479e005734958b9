export { getTools, getToolSpec, getToolSpecs, TOOL_SPECS } from './registry.js';
export type { ToolExposure, ToolExposureMode, ToolSpec } from './registry.js';
export { handleToolCall } from './dispatcher.js';
export type { ToolCallResult } from './dispatcher.js';
