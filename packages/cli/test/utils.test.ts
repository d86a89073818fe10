import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	checkFiles,
	formatBanner,
	formatReadError,
	formatSource,
	formatUnformattableError,
	formatWriteError,
	getErrorMessage,
	isNodeError,
	summarize,
} from '../src/utils.ts'

function errnoError(message: string, code: string): NodeJS.ErrnoException {
	return Object.assign(new Error(message), { code })
}

describe('isNodeError', () => {
	it('should return true for Error with code property', () => {
		assert.strictEqual(isNodeError(errnoError('test', 'ENOENT')), true)
	})

	it('should return false for plain Error', () => {
		assert.strictEqual(isNodeError(new Error('test')), false)
	})

	it('should return false for non-Error', () => {
		assert.strictEqual(isNodeError('string'), false)
		assert.strictEqual(isNodeError(null), false)
		assert.strictEqual(isNodeError(undefined), false)
		assert.strictEqual(isNodeError(42), false)
	})
})

describe('getErrorMessage', () => {
	it('should extract message from Error', () => {
		assert.strictEqual(getErrorMessage(new Error('test message')), 'test message')
	})

	it('should convert non-Error to string', () => {
		assert.strictEqual(getErrorMessage('string error'), 'string error')
		assert.strictEqual(getErrorMessage(42), '42')
		assert.strictEqual(getErrorMessage(null), 'null')
	})
})

describe('formatReadError', () => {
	it('should format ENOENT as file not found', () => {
		const result = formatReadError('/path/to/schema.graphql', errnoError('no such file', 'ENOENT'))
		assert.strictEqual(result, '[FCCLI001] file not found: /path/to/schema.graphql')
	})

	it('should format other errors with the reason', () => {
		const result = formatReadError('/path/to/schema.graphql', errnoError('permission denied', 'EACCES'))
		assert.strictEqual(result, '[FCCLI002] cannot read file: permission denied')
	})

	it('should handle plain Error', () => {
		const result = formatReadError('/path/to/schema.graphql', new Error('unknown error'))
		assert.strictEqual(result, '[FCCLI002] cannot read file: unknown error')
	})
})

describe('formatWriteError', () => {
	it('should include the reason', () => {
		assert.strictEqual(
			formatWriteError(new Error('disk full')),
			'[FCCLI003] cannot write file: disk full'
		)
	})
})

describe('formatUnformattableError', () => {
	it('should name the file and the error count', () => {
		assert.strictEqual(
			formatUnformattableError('query.graphql', 2),
			'[FCCLI004] refusing to format query.graphql: 2 syntax error(s)'
		)
	})
})

describe('summarize', () => {
	it('should report a clean run', () => {
		assert.strictEqual(summarize(0, 1), 'No syntax errors in 1 file')
	})

	it('should pluralize counts', () => {
		assert.strictEqual(summarize(1, 2), 'Found 1 syntax error in 2 files')
		assert.strictEqual(summarize(3, 1), 'Found 3 syntax errors in 1 file')
	})
})

describe('checkFiles', () => {
	it('should report nothing for valid documents', () => {
		const result = checkFiles([
			{ path: 'schema.graphql', text: 'type Query { name: String }' },
			{ path: 'query.graphql', text: '{ name }' },
		])
		assert.strictEqual(result.errorCount, 0)
		assert.deepStrictEqual(result.reports, [])
	})

	it('should render each syntax error with its file name', () => {
		const result = checkFiles([{ path: 'query.graphql', text: 'query { user(id: ) }' }])
		assert.strictEqual(result.errorCount, 1)
		assert.match(result.reports[0] ?? '', /^error\[FCPARSE008\]/)
		assert.match(result.reports[0] ?? '', /--> query\.graphql:1:17/)
	})
})

describe('formatSource', () => {
	it('should print the canonical layout', () => {
		const result = formatSource('query Q{user{id name}}')
		assert.deepStrictEqual(result, {
			ok: true,
			output: 'query Q {\n  user {\n    id\n    name\n  }\n}\n',
		})
	})

	it('should refuse documents with syntax errors', () => {
		const result = formatSource('{ user { id }')
		assert.strictEqual(result.ok, false)
		if (!result.ok) {
			assert.strictEqual(result.diagnostics.length, 1)
			assert.strictEqual(result.diagnostics[0]?.def.code, 'FCPARSE004')
		}
	})
})

describe('formatBanner', () => {
	it('should list every command with its description', () => {
		const lines = formatBanner('1.2.3', [
			{ commandName: 'check', description: 'Report errors' },
			{ commandName: 'format', description: 'Print canonical layout' },
		])
		assert.deepStrictEqual(lines, [
			'facet v1.2.3: checks and formats GraphQL documents',
			'',
			'Usage: facet <command> [options]',
			'',
			'Commands:',
			'  check   Report errors',
			'  format  Print canonical layout',
			'',
			'Run "facet <command> --help" for its arguments and flags.',
		])
	})

	it('should print no command lines for an empty list', () => {
		assert.deepStrictEqual(formatBanner('0.1.0', []).slice(4, 6), ['Commands:', ''])
	})
})
