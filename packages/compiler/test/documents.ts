import fc from 'fast-check'

const fieldName = fc.constantFrom('a', 'b', 'user', 'id', 'name')
const typeName = fc.constantFrom('User', 'Post', 'Query', 'Node')
const argument = fc
	.tuple(fc.constantFrom('x', 'first'), fc.oneof(fc.integer({ max: 99, min: 0 }).map(String), fc.constant('$v')))
	.map(([name, value]) => `${name}: ${value}`)

function selectionSet(depth: number): fc.Arbitrary<string> {
	const nested = depth === 0 ? fc.constant(null) : fc.option(selectionSet(depth - 1), { nil: null })
	const field = fc
		.tuple(fieldName, fc.option(argument, { nil: null }), nested)
		.map(([name, arg, set]) => `${name}${arg === null ? '' : `(${arg})`}${set === null ? '' : ` ${set}`}`)
	return fc.array(field, { maxLength: 3, minLength: 1 }).map((fields) => `{ ${fields.join(' ')} }`)
}

const operation = fc
	.tuple(fc.constantFrom('query', 'mutation', ''), fc.option(typeName, { nil: null }), selectionSet(2))
	.map(([kind, name, set]) => (kind === '' ? set : `${kind} ${name ?? ''} ${set}`))

const typeReference = fc
	.tuple(typeName, fc.boolean(), fc.boolean())
	.map(([name, list, nonNull]) => `${list ? `[${name}]` : name}${nonNull ? '!' : ''}`)

const objectType = fc
	.tuple(typeName, fc.array(fc.tuple(fieldName, typeReference), { maxLength: 4, minLength: 1 }))
	.map(([name, fields]) => `type ${name} { ${fields.map(([f, t]) => `${f}: ${t}`).join(' ')} }`)

/** Error-free documents of operations and object types. */
export const document = fc
	.array(fc.oneof(operation, objectType), { maxLength: 4, minLength: 1 })
	.map((definitions) => definitions.join('\n'))
