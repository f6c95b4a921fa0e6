export {
	validateCatalog,
	extractDefaults,
	findSetting,
	settingSchema,
	categorySchema,
} from './schema'

export type { Setting, Category } from './schema'

export {
	lensSettingsSchema,
	nearestFloatWhenSchema,
	parseLensSettings,
	loadLensSettings,
	lensCatalog,
	LENS_SETTING_KEYS,
} from './lensSettings'

export type {
	LensSettings,
	LensSettingsInput,
	NearestFloatWhen,
} from './lensSettings'
