/**
 * @toolgate/gateway
 *
 * Credential vault, backend registry, connection service, per-user tool
 * gateways and the runtime that wires them together.
 */

export { CredentialVault, MASTER_KEY_LENGTH } from './vault/credential-vault.js';
export {
  MasterKeyManager,
  MASTER_KEY_ENV,
  MASTER_KEY_FILE,
  type MasterKeyManagerOptions,
} from './vault/master-key-manager.js';
export { BackendRegistry } from './backends/registry.js';
export {
  ConnectionService,
  type ConnectionSource,
  type ConnectionTestResult,
  type ConnectionsChangedListener,
  type CreateConnectionInput,
  type UpdateConnectionInput,
} from './services/connection-service.js';
export { ToolGateway, type CallToolOptions, type ToolGatewayOptions } from './gateway/tool-gateway.js';
export { UserGatewayPool, type UserGatewayPoolOptions } from './gateway/user-gateway-pool.js';
export {
  createGatewayRuntime,
  type GatewayRuntime,
  type GatewayRuntimeOptions,
} from './runtime.js';
