/**
 * Profile item facade
 *
 * An item is addressed by its URI, which is the Location AMEE returns on
 * creation (or one built from the returned UID).
 */

import type { AmeeClient } from '../api/client.js'
import { ItemAmountSchema, ItemCreatedSchema, type Amount } from '../api/schemas.js'
import type { JsonDocument, RequestDescriptor } from '../api/types.js'
import { UnexpectedResponseError, ValidationError } from '../errors/index.js'

/**
 * Unit co2() reports in
 */
export const CO2_UNIT = 'kg/year'

export class ProfileItem {
  readonly uri: string
  private readonly client: AmeeClient
  private deleted = false

  constructor(client: AmeeClient, uri: string) {
    this.client = client
    this.uri = uri
  }

  /**
   * Build the facade from a creation response
   *
   * @param collectionPath - Path the item was POSTed to
   */
  static fromCreated(client: AmeeClient, collectionPath: string, document: JsonDocument): ProfileItem {
    if (typeof document.location === 'string' && document.location !== '') {
      return new ProfileItem(client, document.location)
    }

    const parsed = ItemCreatedSchema.safeParse(document)
    if (!parsed.success) {
      throw new UnexpectedResponseError('Profile item creation response carries no location or uid', {
        method: 'POST',
        path: collectionPath,
        field: 'uid',
      })
    }

    const uid = 'profileItem' in parsed.data ? parsed.data.profileItem.uid : parsed.data.uid
    return new ProfileItem(client, `${collectionPath}/${uid}`)
  }

  /**
   * Last path segment of the URI
   */
  get uid(): string {
    const [path] = this.uri.split('?')
    const segments = path.split('/').filter((segment) => segment !== '')
    return segments.length > 0 ? segments[segments.length - 1] : ''
  }

  isDeleted(): boolean {
    return this.deleted
  }

  private get readDescriptor(): RequestDescriptor {
    return { method: 'GET', path: this.uri }
  }

  /**
   * Fetch the item document. Served from cache when one is configured.
   */
  async get(): Promise<JsonDocument> {
    if (this.deleted) {
      throw new ValidationError('Profile item has been deleted')
    }
    return this.client.request(this.readDescriptor)
  }

  /**
   * The amount of carbon dioxide this item represents, in kilograms per year
   *
   * @throws UnexpectedResponseError when the document has no amount, or
   *   reports it in another unit
   */
  async co2(): Promise<number> {
    const document = await this.get()

    const parsed = ItemAmountSchema.safeParse(document)
    if (!parsed.success) {
      throw new UnexpectedResponseError(`Profile item ${this.uri} reports no amount`, {
        method: 'GET',
        path: this.uri,
        field: 'amount',
      })
    }

    const amount: Amount = 'amount' in parsed.data ? parsed.data.amount : parsed.data.profileItem.amount
    return amountInKilograms(amount, this.uri)
  }

  /**
   * Delete this item and drop its cached document
   */
  async delete(): Promise<void> {
    if (this.deleted) {
      throw new ValidationError('Profile item has already been deleted')
    }
    await this.client.request({ method: 'DELETE', path: this.uri })
    await this.client.invalidate(this.readDescriptor)
    this.deleted = true
  }
}

function amountInKilograms(amount: Amount, uri: string): number {
  if (typeof amount === 'number') return amount

  if (amount.unit !== CO2_UNIT) {
    throw new UnexpectedResponseError(
      `Profile item uses unit '${amount.unit}' rather than ${CO2_UNIT}`,
      { method: 'GET', path: uri, field: 'amount.unit' }
    )
  }
  return amount.value
}

export default ProfileItem
