export {Environment, Provisioner} from './provisioner.js'
export {LocalProvisioner, LocalEnvironment, hostOs, type LocalProvisionerOptions} from './local-provisioner.js'
export {CacheStore, DirectoryCacheStore} from './cache-store.js'
export type {ExecRequest, ExecResult, OnLogLine} from './types.js'
