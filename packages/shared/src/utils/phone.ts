import { parsePhoneNumberFromString, type CountryCode } from 'libphonenumber-js';

export function normalizePhoneNumber(raw: string, defaultCountry: CountryCode = 'US'): string | null {
    const trimmed = raw.trim();
    if (!trimmed) {
        return null;
    }

    const parsed = parsePhoneNumberFromString(trimmed, defaultCountry);
    if (!parsed || !parsed.isValid()) {
        return null;
    }

    return parsed.number;
}
