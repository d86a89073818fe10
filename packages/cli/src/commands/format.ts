import { readFile, writeFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { formatDiagnostic } from '@facet/compiler'
import {
	formatReadError,
	formatSource,
	formatUnformattableError,
	formatWriteError,
} from '../utils.ts'

export default class FormatCommand extends BaseCommand {
	static override commandName = 'format'
	static override description = 'Print a GraphQL document in canonical layout'

	@args.string({ description: 'Document to format' })
	declare input: string

	@flags.boolean({ alias: 'w', description: 'Rewrite the file instead of printing it' })
	declare write: boolean

	private async readSourceFile(): Promise<string | null> {
		try {
			return await readFile(this.input, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.input, error))
			this.exitCode = 1
			return null
		}
	}

	private async writeOutputFile(content: string): Promise<void> {
		try {
			await writeFile(this.input, content)
			this.logger.success(`Formatted ${this.input}`)
		} catch (error: unknown) {
			this.logger.error(formatWriteError(error))
			this.exitCode = 1
		}
	}

	override async run(): Promise<void> {
		const source = await this.readSourceFile()
		if (source === null) return

		const result = formatSource(source)
		if (!result.ok) {
			for (const diagnostic of result.diagnostics) {
				this.logger.log(`${formatDiagnostic(diagnostic, source, this.input)}\n`)
			}
			this.logger.error(formatUnformattableError(this.input, result.diagnostics.length))
			this.exitCode = 1
			return
		}

		if (this.write) await this.writeOutputFile(result.output)
		else this.logger.log(result.output.trimEnd())
	}
}
