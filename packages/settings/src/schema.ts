import { z } from 'zod'

/**
 * Schema for a single entry in a settings catalogue.
 */
export const settingSchema = z.object({
	id: z.string().min(1),
	default: z.unknown(),
	description: z.string().optional(),
	options: z
		.union([
			z.array(z.string()),
			z.array(z.object({ value: z.string(), label: z.string() })),
		])
		.optional(),
})

export type Setting = z.infer<typeof settingSchema>

export type Category = {
	id: string
	label: string
	settings?: Setting[]
	children?: Category[]
}

/**
 * Schema for a catalogue category (recursive).
 */
export const categorySchema: z.ZodType<Category> = z.lazy(() =>
	z.object({
		id: z.string().min(1),
		label: z.string(),
		settings: z.array(settingSchema).optional(),
		children: z.array(categorySchema).optional(),
	})
)

/**
 * Validates a catalogue JSON document. Throws a ZodError if invalid.
 */
export function validateCatalog(json: unknown): Category {
	return categorySchema.parse(json)
}

/**
 * Flattens a category tree into dot-notation keys and their defaults:
 * `{ "searchLens.nearest.only": false, ... }`
 */
export function extractDefaults(
	category: Category,
	prefix = ''
): Record<string, unknown> {
	const result: Record<string, unknown> = {}
	const path = prefix ? `${prefix}.${category.id}` : category.id

	for (const setting of category.settings ?? []) {
		if (setting.default !== undefined) {
			result[`${path}.${setting.id}`] = setting.default
		}
	}

	for (const child of category.children ?? []) {
		Object.assign(result, extractDefaults(child, path))
	}

	return result
}

/**
 * Finds a setting by its dot-notation key.
 */
export function findSetting(
	category: Category,
	key: string
): Setting | undefined {
	const parts = key.split('.')
	if (parts[0] !== category.id || parts.length < 2) return undefined

	let node: Category | undefined = category
	for (const id of parts.slice(1, -1)) {
		node = node.children?.find((child) => child.id === id)
		if (!node) return undefined
	}

	const settingId = parts[parts.length - 1]
	return node.settings?.find((setting) => setting.id === settingId)
}
