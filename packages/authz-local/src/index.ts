/**
 * @toolgate/authz-local
 *
 * Permission evaluator and administration backed by the tool_permissions
 * table.
 */

export {
  ToolPermissionEvaluator,
  evaluatePermission,
  type ToolPermissionEvaluatorOptions,
} from './evaluator.js';
export { ToolPermissionService, type SetPermissionInput } from './service.js';
export { DEFAULT_TOOL_CATALOG, loadToolCatalog, type ToolCatalog } from './catalog.js';
