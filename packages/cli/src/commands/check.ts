import { readFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { checkFiles, formatReadError, type SourceFile, summarize } from '../utils.ts'

export default class CheckCommand extends BaseCommand {
	static override commandName = 'check'
	static override description = 'Report syntax errors in GraphQL documents'

	@args.spread({ description: 'Documents to check' })
	declare files: string[]

	@flags.boolean({ alias: 'q', description: 'Print only the summary' })
	declare quiet: boolean

	private async readSourceFiles(): Promise<SourceFile[] | null> {
		const sources: SourceFile[] = []
		for (const path of this.files) {
			try {
				sources.push({ path, text: await readFile(path, 'utf-8') })
			} catch (error: unknown) {
				this.logger.error(formatReadError(path, error))
				this.exitCode = 1
				return null
			}
		}
		return sources
	}

	override async run(): Promise<void> {
		const sources = await this.readSourceFiles()
		if (sources === null) return

		const { errorCount, reports } = checkFiles(sources)
		if (!this.quiet) {
			for (const report of reports) this.logger.log(`${report}\n`)
		}

		const summary = summarize(errorCount, sources.length)
		if (errorCount > 0) {
			this.logger.error(summary)
			this.exitCode = 1
		} else {
			this.logger.success(summary)
		}
	}
}
