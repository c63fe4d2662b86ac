import { getConfig, type AppConfig } from './config'
import { FileStorage } from './storage'
import { FileStore } from './store'

export const USER_HEADER = 'x-user-id'
export const ANONYMOUS_USER = 'anonymous'

export interface Services {
  config: AppConfig
  store: FileStore
  storage: FileStorage
}

/** Everything a request handler needs, passed explicitly instead of read from globals */
export interface RequestContext extends Services {
  userId: string
}

let services: Services | null = null

export function createServices(config: AppConfig): Services {
  return {
    config,
    store: new FileStore(config.databasePath),
    storage: new FileStorage(config.uploadsDir),
  }
}

export function getServices(): Services {
  if (!services) {
    services = createServices(getConfig())
  }
  return services
}

// The auth provider sits in front of the app and forwards the signed-in user's id
export function userIdFrom(headers: Headers): string {
  const raw = headers.get(USER_HEADER)?.trim()
  return raw ? raw : ANONYMOUS_USER
}

export function createRequestContext(headers: Headers, base: Services = getServices()): RequestContext {
  return { ...base, userId: userIdFrom(headers) }
}
