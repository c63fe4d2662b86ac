import { describe, it, expect } from 'vitest'
import { ANONYMOUS_USER, createRequestContext, createServices, userIdFrom } from '@/lib/context'
import { loadConfig } from '@/lib/config'
import { makeTempDir } from '../helpers/fixtures'

describe('userIdFrom', () => {
  it('should read the forwarded user id', () => {
    expect(userIdFrom(new Headers({ 'x-user-id': ' user-7 ' }))).toBe('user-7')
  })

  it('should default to anonymous', () => {
    expect(userIdFrom(new Headers())).toBe(ANONYMOUS_USER)
    expect(userIdFrom(new Headers({ 'x-user-id': '   ' }))).toBe('anonymous')
  })
})

describe('createRequestContext', () => {
  it('should carry the services and the caller', () => {
    const dir = makeTempDir()
    const services = createServices(loadConfig({ DATABASE_PATH: ':memory:', UPLOADS_DIR: dir }, dir))
    const ctx = createRequestContext(new Headers({ 'x-user-id': 'user-3' }), services)

    expect(ctx.userId).toBe('user-3')
    expect(ctx.store).toBe(services.store)
    expect(ctx.storage).toBe(services.storage)
    expect(ctx.config.uploadsDir).toBe(dir)
  })
})
