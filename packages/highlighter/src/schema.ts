import { z } from 'zod'

/**
 * Declarative definition source, one per language file.
 * Rules are checked one by one so a bad rule never sinks the whole file.
 */
export const definitionSourceSchema = z.object({
	name: z.string().trim().min(1),
	extensions: z.array(z.string().trim().min(1)).min(1),
	colors: z.record(z.string(), z.string().trim().min(1)),
	rules: z.array(z.unknown()).default([]),
	multiline_rules: z.array(z.unknown()).default([]),
})

export const ruleSourceSchema = z.object({
	name: z.string().optional(),
	pattern: z.string().min(1),
	color: z.string().min(1),
	bold: z.boolean().optional(),
	italic: z.boolean().optional(),
	underline: z.boolean().optional(),
	case_insensitive: z.boolean().optional(),
	group: z.number().int().min(0).optional(),
	priority: z.number().optional(),
})

export const regionSourceSchema = z
	.object({
		name: z.string().optional(),
		start: z.string().min(1),
		end: z.string().min(1),
		color: z.string().min(1).optional(),
		nested_language: z.string().trim().min(1).optional(),
		bold: z.boolean().optional(),
		italic: z.boolean().optional(),
		underline: z.boolean().optional(),
		case_insensitive: z.boolean().optional(),
	})
	.refine(
		(region) =>
			region.color !== undefined || region.nested_language !== undefined,
		{ message: 'region rule needs a color or a nested_language' }
	)

export type DefinitionSource = z.infer<typeof definitionSourceSchema>
export type RuleSource = z.infer<typeof ruleSourceSchema>
export type RegionSource = z.infer<typeof regionSourceSchema>
