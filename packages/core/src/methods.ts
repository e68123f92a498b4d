/**
 * HTTP methods and method sets
 */

// HTTP Methods
export const Methods = {
	GET: 0,
	POST: 1,
	PUT: 2,
	DELETE: 3,
	PATCH: 4,
	HEAD: 5,
	OPTIONS: 6,
	CONNECT: 7,
	TRACE: 8,
} as const

export type Method = keyof typeof Methods

export type MethodCode = (typeof Methods)[Method]

export const MethodNames: Record<MethodCode, Method> = {
	0: 'GET',
	1: 'POST',
	2: 'PUT',
	3: 'DELETE',
	4: 'PATCH',
	5: 'HEAD',
	6: 'OPTIONS',
	7: 'CONNECT',
	8: 'TRACE',
}

const CANONICAL_ORDER = Object.values(MethodNames)

export const isMethod = (name: string): name is Method => Object.hasOwn(Methods, name)

// ============================================================================
// Verbs (method sets)
// ============================================================================

/**
 * A set of HTTP methods, one bit per method code
 */
export type Verbs = number

export const NO_VERBS: Verbs = 0

export const verbs = (...methods: readonly Method[]): Verbs =>
	methods.reduce((set, method) => set | (1 << Methods[method]), NO_VERBS)

export const unionVerbs = (a: Verbs, b: Verbs): Verbs => a | b

export const hasVerb = (set: Verbs, method: string): boolean =>
	isMethod(method) && (set & (1 << Methods[method])) !== 0

/**
 * Methods in the set, in canonical order (GET, POST, PUT, ...)
 */
export const verbList = (set: Verbs): Method[] =>
	CANONICAL_ORDER.filter((method) => (set & (1 << Methods[method])) !== 0)

/** Value for an `allow` response header */
export const allowHeader = (set: Verbs): string => verbList(set).join(', ')
