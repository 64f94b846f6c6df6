/**
 * Profile facade
 *
 * A profile is the account context AMEE tracks items under. The facade holds
 * only the UID; every operation is a request through the client pipeline.
 */

import type { AmeeClient } from '../api/client.js'
import type { JsonValue, QueryValue } from '../api/types.js'
import { assertCategoryPath } from '../api/utils.js'
import { ValidationError } from '../errors/index.js'
import { ProfileItem } from './ProfileItem.js'

export class Profile {
  private readonly client: AmeeClient
  private currentUid: string | null

  constructor(client: AmeeClient, uid: string) {
    this.client = client
    this.currentUid = uid
  }

  /**
   * The profile UID, or null once the profile has been deleted
   */
  get uid(): string | null {
    return this.currentUid
  }

  isDeleted(): boolean {
    return this.currentUid === null
  }

  /**
   * Delete this profile. The facade is unusable afterwards.
   */
  async delete(): Promise<void> {
    if (this.currentUid === null) {
      throw new ValidationError('Profile has already been deleted')
    }
    await this.client.deleteProfile(this.currentUid)
    this.currentUid = null
  }

  /**
   * Create a profile item
   *
   * @param path - Data category, e.g. '/business/energy/electricity'
   * @param choices - Drill choices that select one data item
   * @param values - Item values, e.g. `{ energyPerTime: 1000 }`
   * @throws ValidationError when the profile is deleted, the path is
   *   malformed, or the choices do not pin down a data item
   */
  async createItem(
    path: string,
    choices: Record<string, QueryValue>,
    values: Record<string, JsonValue>
  ): Promise<ProfileItem> {
    if (this.currentUid === null) {
      throw new ValidationError('Profile has been deleted')
    }
    assertCategoryPath(path)

    const dataItemUid = await this.client.resolveDataItemUid(path, choices)
    const collectionPath = `/profiles/${encodeURIComponent(this.currentUid)}${path}`

    const document = await this.client.request({
      method: 'POST',
      path: collectionPath,
      body: { dataItemUid, ...values },
    })

    return ProfileItem.fromCreated(this.client, collectionPath, document)
  }
}

export default Profile
