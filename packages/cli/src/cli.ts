#!/usr/bin/env -S node --import tsx

import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import CheckCommand from './commands/check.ts'
import FormatCommand from './commands/format.ts'
import { formatBanner } from './utils.ts'

const version = '0.1.0'

async function main(): Promise<void> {
	const kernel = Kernel.create()

	kernel.info.set('binary', 'facet')
	kernel.info.set('version', version)

	kernel.defineFlag('help', {
		alias: 'h',
		description: 'Display help information',
		type: 'boolean',
	})

	kernel.defineFlag('version', {
		alias: 'v',
		description: 'Display version number',
		type: 'boolean',
	})

	kernel.addLoader(new ListLoader([CheckCommand, FormatCommand, HelpCommand]))

	kernel.on('finding:command', async () => {
		for (const line of formatBanner(version, [CheckCommand, FormatCommand])) console.log(line)
		return true
	})

	await kernel.handle(process.argv.slice(2))
}

main().catch((error: unknown) => {
	console.error(error)
	process.exit(1)
})
