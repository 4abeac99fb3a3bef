/**
 * Substrings rejected anywhere in a string leaf, compared case-insensitively.
 */
export const DANGEROUS_PATTERNS: readonly string[] = [
	// code execution
	'__import__',
	'eval',
	'exec',
	'compile',
	'open',
	'file',
	// script injection
	'<script',
	'</script>',
	'javascript:',
	'data:',
	// path traversal
	'../',
	'..\\',
	'/etc/',
	'c:\\',
	// destructive shell / sql
	'cmd.exe',
	'powershell',
	'rm -rf',
	'del /',
	'format c:',
	'drop table',
];

export const RESERVED_KEY_PREFIX = '__';

export const RESERVED_KEY_NAMES: ReadonlySet<string> = new Set(['constructor', 'prototype']);
