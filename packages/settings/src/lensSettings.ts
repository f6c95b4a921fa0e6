import { z } from 'zod'
import { loggers } from '@lensline/logger'
import lensCatalogJson from '../schemas/lens.json'
import { extractDefaults, validateCatalog, type Category } from './schema'

const log = loggers.settings.withTag('lens')

export const nearestFloatWhenSchema = z.enum(['auto', 'always', 'never'])

export type NearestFloatWhen = z.infer<typeof nearestFloatWhenSchema>

export const lensSettingsSchema = z.object({
	/** Skip the range walk and only draw the nearest lens */
	nearestOnly: z.boolean().default(false),
	nearestFloatWhen: nearestFloatWhenSchema.default('auto'),
	/** Stop on text change or when the cursor leaves the nearest match */
	calmDown: z.boolean().default(false),
	refreshDelayMs: z.number().int().nonnegative().default(150),
})

export type LensSettings = z.infer<typeof lensSettingsSchema>
export type LensSettingsInput = z.input<typeof lensSettingsSchema>

/** Catalogue key for each field of LensSettings */
export const LENS_SETTING_KEYS = {
	nearestOnly: 'searchLens.nearest.only',
	nearestFloatWhen: 'searchLens.nearest.floatWhen',
	calmDown: 'searchLens.calmDown',
	refreshDelayMs: 'searchLens.refreshDelayMs',
} as const satisfies Record<keyof LensSettings, string>

export const lensCatalog: Category = validateCatalog(lensCatalogJson)

/**
 * Parses engine settings, filling in defaults. Throws a ZodError when a
 * value has the wrong shape.
 */
export function parseLensSettings(input: LensSettingsInput = {}): LensSettings {
	return lensSettingsSchema.parse(input)
}

/**
 * Builds settings from dot-notation catalogue values, e.g. the flattened
 * contents of a user settings file. Keys outside the catalogue are ignored.
 */
export function loadLensSettings(
	values: Record<string, unknown> = {}
): LensSettings {
	const merged: Record<string, unknown> = {
		...extractDefaults(lensCatalog),
	}

	for (const [key, value] of Object.entries(values)) {
		if (!(key in merged)) {
			log.warn('Ignoring unknown setting', { key })
			continue
		}
		merged[key] = value
	}

	return lensSettingsSchema.parse({
		nearestOnly: merged[LENS_SETTING_KEYS.nearestOnly],
		nearestFloatWhen: merged[LENS_SETTING_KEYS.nearestFloatWhen],
		calmDown: merged[LENS_SETTING_KEYS.calmDown],
		refreshDelayMs: merged[LENS_SETTING_KEYS.refreshDelayMs],
	})
}
