/**
 * AMEE API Client
 * @module api/client
 *
 * Single entry point tying authentication, transport and the response cache
 * together. Provides:
 * - request: generic pipeline, the escape hatch for any endpoint
 * - createProfile / listProfiles / deleteProfile
 * - drill / resolveDataItemUid: data item lookup by category choices
 */

import { createCacheKey, isCacheable } from '../cache/keys.js'
import type { ResponseCache } from '../cache/types.js'
import { resolveClientConfig } from '../config.js'
import {
  CacheUnavailableError,
  UnexpectedResponseError,
  ValidationError,
  getErrorMessage,
} from '../errors/index.js'
import { Profile } from '../resources/Profile.js'
import { createLogger, type Logger } from '../utils/logger.js'
import { DrillResponseSchema, ProfileCreatedSchema, ProfileListSchema } from './schemas.js'
import { AmeeTransport } from './transport.js'
import { assertCategoryPath } from './utils.js'
import type {
  AmeeClientConfig,
  DrillResult,
  JsonDocument,
  QueryValue,
  RequestDescriptor,
} from './types.js'

/**
 * AMEE API Client
 *
 * @example
 * ```typescript
 * const client = new AmeeClient({
 *   username: process.env.AMEE_USERNAME,
 *   password: process.env.AMEE_PASSWORD,
 *   cache: new MemoryResponseCache(),
 * })
 *
 * const profile = await client.createProfile()
 * const electricity = await profile.createItem(
 *   '/business/energy/electricity',
 *   { country: 'United Kingdom' },
 *   { energyPerTime: 1000 }
 * )
 * console.log(`${await electricity.co2()} kg CO2 per year`)
 * await profile.delete()
 * ```
 */
export class AmeeClient {
  readonly server: string
  private readonly transport: AmeeTransport
  private readonly cache: ResponseCache | undefined
  private readonly cacheTtl: number
  private readonly log: Logger

  constructor(config: AmeeClientConfig = {}) {
    const resolved = resolveClientConfig(config)

    this.server = resolved.server
    this.cache = config.cache
    this.cacheTtl = resolved.cacheTtl
    this.log = config.logger ?? createLogger('client')
    this.transport = new AmeeTransport({
      server: resolved.server,
      username: resolved.username,
      password: resolved.password,
      timeout: resolved.timeout,
      logger: config.logger,
    })
  }

  /**
   * Exchange credentials for a session token unless one is held
   *
   * @throws AuthError when the credentials are rejected
   */
  async authenticate(): Promise<void> {
    await this.transport.authenticate()
  }

  isAuthenticated(): boolean {
    return this.transport.hasToken()
  }

  /**
   * Run a descriptor through the pipeline: cache lookup for reads, then the
   * network, then cache fill. Errors from the transport propagate unchanged.
   */
  async request(descriptor: RequestDescriptor): Promise<JsonDocument> {
    const key =
      this.cache !== undefined && isCacheable(descriptor)
        ? createCacheKey(this.server, descriptor)
        : undefined

    if (this.cache !== undefined && key !== undefined) {
      const cached = await this.readCache(this.cache, key)
      if (cached !== undefined) {
        this.log.debug('Cache hit', { key })
        return cached
      }
      this.log.debug('Cache miss', { key })
    }

    const response = await this.transport.send(descriptor)

    if (this.cache !== undefined && key !== undefined) {
      await this.writeCache(this.cache, key, response, descriptor.ttl ?? this.cacheTtl)
    }

    return response
  }

  /**
   * Drop the cached answer for a read descriptor, if any
   */
  async invalidate(descriptor: RequestDescriptor): Promise<void> {
    if (this.cache === undefined || !isCacheable(descriptor)) return

    const key = createCacheKey(this.server, descriptor)
    try {
      await this.cache.delete(key)
    } catch (error) {
      this.reportCacheFailure('delete', key, error)
    }
  }

  // ==========================================================================
  // Profiles
  // ==========================================================================

  /**
   * Create a new AMEE profile
   */
  async createProfile(): Promise<Profile> {
    const descriptor: RequestDescriptor = {
      method: 'POST',
      path: '/profiles',
      body: { profile: 'true' },
    }
    const document = await this.request(descriptor)

    const parsed = ProfileCreatedSchema.safeParse(document)
    if (!parsed.success) {
      throw new UnexpectedResponseError('Profile creation response carries no uid', {
        method: 'POST',
        path: descriptor.path,
        field: 'uid',
      })
    }

    const uid = 'profile' in parsed.data ? parsed.data.profile.uid : parsed.data.uid
    return new Profile(this, uid)
  }

  /**
   * List every profile under the account. Never served from cache.
   */
  async listProfiles(): Promise<Profile[]> {
    const document = await this.request({ path: '/profiles', cache: false })

    const parsed = ProfileListSchema.safeParse(document)
    if (!parsed.success) {
      throw new UnexpectedResponseError('Profile list response is malformed', {
        method: 'GET',
        path: '/profiles',
        field: 'profiles',
      })
    }

    return parsed.data.profiles.map((entry) => new Profile(this, entry.uid))
  }

  /**
   * Delete an AMEE profile, given the UID
   */
  async deleteProfile(uid: string): Promise<void> {
    await this.request({ method: 'DELETE', path: `/profiles/${encodeURIComponent(uid)}` })
  }

  // ==========================================================================
  // Data items
  // ==========================================================================

  /**
   * Perform a data item drill-down. Answers are cached like any read.
   *
   * @param path - Data category, e.g. '/business/energy/electricity'
   * @param choices - Choices made so far, e.g. `{ country: 'United Kingdom' }`
   */
  async drill(path: string, choices: Record<string, QueryValue> = {}): Promise<DrillResult> {
    assertCategoryPath(path)
    const descriptor: RequestDescriptor = { path: `/data${path}/drill`, query: choices }
    const document = await this.request(descriptor)

    const parsed = DrillResponseSchema.safeParse(document)
    if (!parsed.success) {
      throw new UnexpectedResponseError('Drill response carries no choices', {
        method: 'GET',
        path: descriptor.path,
        field: 'choices',
      })
    }

    // Each choice has identical name and value; keep the name
    const names = parsed.data.choices.choices.map((choice) => choice.name)

    if (parsed.data.choices.name === 'uid') {
      if (names.length === 0) {
        throw new ValidationError('No choices returned. Did you specify an invalid value?', {
          field: 'choices',
          context: { path, choices },
        })
      }
      return { complete: true, uid: names[0] }
    }

    return { complete: false, name: parsed.data.choices.name, choices: names }
  }

  /**
   * Drill all the way to a data item UID
   *
   * @throws ValidationError naming the next choice when `choices` is incomplete
   */
  async resolveDataItemUid(path: string, choices: Record<string, QueryValue>): Promise<string> {
    const result = await this.drill(path, choices)
    if (!result.complete) {
      throw new ValidationError(`Incomplete drilldown, '${result.name}' must be specified`, {
        field: result.name,
        context: { path, options: result.choices },
      })
    }
    return result.uid
  }

  // ==========================================================================
  // Cache plumbing
  // ==========================================================================

  private async readCache(cache: ResponseCache, key: string): Promise<JsonDocument | undefined> {
    try {
      return await cache.get(key)
    } catch (error) {
      this.reportCacheFailure('get', key, error)
      return undefined
    }
  }

  private async writeCache(
    cache: ResponseCache,
    key: string,
    value: JsonDocument,
    ttl: number
  ): Promise<void> {
    try {
      await cache.set(key, value, ttl)
    } catch (error) {
      this.reportCacheFailure('set', key, error)
    }
  }

  private reportCacheFailure(operation: 'get' | 'set' | 'delete', key: string, error: unknown): void {
    const failure = new CacheUnavailableError(
      `Cache ${operation} failed, continuing without cache: ${getErrorMessage(error)}`,
      { cause: error, key, operation }
    )
    this.log.warn(failure.message, { code: failure.code, key, operation })
  }
}

// ============================================================================
// Factory Function
// ============================================================================

/**
 * Create a client from options and AMEE_* environment variables
 */
export function createAmeeClient(config?: AmeeClientConfig): AmeeClient {
  return new AmeeClient(config)
}

export default AmeeClient
