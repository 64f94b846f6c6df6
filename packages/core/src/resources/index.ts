/**
 * Domain facades over the request pipeline
 */
export { Profile } from './Profile.js'
export { ProfileItem, CO2_UNIT } from './ProfileItem.js'
