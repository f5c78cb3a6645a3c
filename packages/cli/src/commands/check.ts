import { readFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { type ElaborationResult, elaborate } from '@svtype/compiler'
import { formatInternalError, formatReadError, renderReport } from '../utils.ts'

export default class CheckCommand extends BaseCommand {
	static override commandName = 'check'
	static override description = 'Elaborate a SystemVerilog file and print the type of every declaration'

	@args.string({ description: 'Input .sv file to elaborate' })
	declare input: string

	@flags.boolean({ description: 'Print declarations as a JSON array' })
	declare json: boolean

	private async readSourceFile(): Promise<string | null> {
		try {
			return await readFile(this.input, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.input, error))
			this.exitCode = 1
			return null
		}
	}

	private elaborateSource(source: string): ElaborationResult | null {
		try {
			return elaborate(source, { filename: this.input })
		} catch (error: unknown) {
			this.logger.error(formatInternalError(error))
			this.exitCode = 1
			return null
		}
	}

	override async run(): Promise<void> {
		const source = await this.readSourceFile()
		if (source === null) return

		const result = this.elaborateSource(source)
		if (result === null) return

		const report = renderReport(result, this.json === true)
		if (report.length > 0) this.logger.log(report)
		if (result.context.hasErrors()) this.exitCode = 1
	}
}
