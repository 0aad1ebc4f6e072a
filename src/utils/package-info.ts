import fs from 'fs-extra'
import path from 'path'
import { z } from 'zod'

const PackageInfoSchema = z.object({
	name: z.string(),
	version: z.string(),
	description: z.string().default(''),
})

export type PackageInfo = z.infer<typeof PackageInfoSchema>

/**
 * Read name, version and description from the package.json that ships with
 * the given module. Looks in the module's directory and then upwards, so it
 * works from src/ under vitest and from dist/ once built.
 * @throws Error when no package.json is found or it lacks name/version
 */
export function getPackageInfo(moduleFile: string): PackageInfo {
	let dir = path.dirname(moduleFile)

	while (true) {
		const candidate = path.join(dir, 'package.json')
		if (fs.pathExistsSync(candidate)) {
			const parsed = PackageInfoSchema.safeParse(fs.readJsonSync(candidate))
			if (!parsed.success) {
				throw new Error(`Invalid package.json at ${candidate}: ${parsed.error.issues.map(i => i.message).join(', ')}`)
			}
			return parsed.data
		}

		const parent = path.dirname(dir)
		if (parent === dir) {
			throw new Error(`package.json not found above ${moduleFile}`)
		}
		dir = parent
	}
}
