/**
 * Public API of the resolver package.
 */

export * from './errors'
export * from './crypto'
export * from './identity'
export * from './dns'
export * from './signed-packet'
export * from './dht'
export * from './logging'
export {
  configSchema,
  getConfigDef,
  getConfigDefaults,
  resolveConfig,
  validateConfigValue,
} from './config'
export type { ConfigEnv, ConfigKey, PkarrConfig } from './config'
export type { IUdpSocket, ISocketFactory } from './interfaces/socket'
export { NodeSocketFactory, NodeUdpSocket } from './adapters/node/node-socket'
