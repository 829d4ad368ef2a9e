// CHANGE: POSIX shell quoting for values spliced into command strings
// FORMAT THEOREM: ∀s: sh -c "printf %s $(shellQuote(s))" prints s
// PURITY: CORE
// COMPLEXITY: O(n)

const SAFE_ARGUMENT = /^[A-Za-z0-9_@%+=:,./-]+$/u;

/**
 * Quotes an argument for `/bin/sh`. Safe words are returned unchanged.
 *
 * @example
 * ```ts
 * shellQuote("src/app.py");   // src/app.py
 * shellQuote("it's done");    // 'it'\''s done'
 * ```
 *
 * @pure true
 */
export function shellQuote(value: string): string {
	if (value.length === 0) return "''";
	if (SAFE_ARGUMENT.test(value)) return value;
	return `'${value.replaceAll("'", `'\\''`)}'`;
}

/**
 * Substitutes `{name}` placeholders with shell-quoted values.
 * Unknown placeholders are left as written.
 *
 * @example
 * ```ts
 * fillTemplate("ruff check {file_path}", { file_path: "a b.py" });
 * // ruff check 'a b.py'
 * ```
 *
 * @pure true
 */
export function fillTemplate(
	template: string,
	values: Readonly<Record<string, string>>,
): string {
	return template.replace(/\{([a-z_]+)\}/gu, (whole, key: string) => {
		const value = values[key];
		return value === undefined ? whole : shellQuote(value);
	});
}
