/**
 * Phone normalization to E.164 using libphonenumber-js.
 *
 * Lenient on purpose: a number is accepted when it has a possible length for the country it
 * parses under, not only when it is assigned.
 */

import { parsePhoneNumberFromString, type CountryCode } from 'libphonenumber-js'
import { badRequest } from './errors.js'
import { DEFAULT_PHONE_COUNTRY } from '../config/constants.js'

const COMMON_COUNTRIES: CountryCode[] = [
  'VE',
  'AR',
  'CO',
  'MX',
  'US',
  'ES',
  'BR',
  'CL',
  'PE',
  'EC',
  'GB',
  'FR',
  'DE',
  'IT',
  'PT',
]

function possibleE164(text: string, country?: CountryCode): string | null {
  const parsed = parsePhoneNumberFromString(text, country)
  return parsed && parsed.isPossible() ? parsed.number : null
}

function asInternational(phone: string): string {
  if (phone.startsWith('+')) return phone
  if (phone.startsWith('00')) return `+${phone.slice(2)}`
  return `+${phone}`
}

/**
 * Normalize to E.164.
 *
 * Tried in order: the default country, the number as international (`+` or `00` prefix,
 * or digits that already carry a country code), then a fixed list of common countries.
 *
 * @throws {ApiError} 400 `Invalid phone number: <raw>`
 *
 * @example
 * ```typescript
 * normalizePhone('0424-123.4567') // '+584241234567'
 * normalizePhone('+34 612 345 678') // '+34612345678'
 * ```
 */
export function normalizePhone(raw: string, defaultCountry: CountryCode = DEFAULT_PHONE_COUNTRY): string {
  const phone = raw.trim()
  if (!phone) {
    throw badRequest(`Invalid phone number: ${raw}`)
  }

  const candidates: Array<() => string | null> = [
    () => possibleE164(phone, defaultCountry),
    () => possibleE164(asInternational(phone)),
    ...COMMON_COUNTRIES.map((country) => () => possibleE164(phone, country)),
  ]

  for (const candidate of candidates) {
    const normalized = candidate()
    if (normalized) return normalized
  }

  throw badRequest(`Invalid phone number: ${raw}`)
}

export function tryNormalizePhone(raw: string, defaultCountry?: CountryCode): string | null {
  try {
    return normalizePhone(raw, defaultCountry)
  } catch {
    return null
  }
}
