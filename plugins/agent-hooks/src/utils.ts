/**
 * Utility functions for agent-hooks
 */

/** Patterns for secret detection */
const SECRET_PATTERNS = [
	// API keys and tokens
	/(?:api[_-]?key|apikey|api[_-]?token)[\s]*[=:]\s*["']?([A-Za-z0-9_-]{16,})["']?/gi,
	/(?:auth[_-]?token|access[_-]?token|bearer)[\s]*[=:]\s*["']?([A-Za-z0-9_-]{16,})["']?/gi,
	// GitHub tokens
	/gh[pousr]_[A-Za-z0-9_]{36,}/g,
	// Generic passwords
	/(?:password|passwd|pwd|secret)[\s]*[=:]\s*["']?([^\s"']{8,})["']?/gi,
];

/** Redact secrets from a string */
export function redactSecrets(input: string): string {
	let result = input;
	for (const pattern of SECRET_PATTERNS) {
		result = result.replace(pattern, (match) => {
			// Keep the first few chars
			const visible = Math.min(4, Math.floor(match.length / 4));
			return `${match.slice(0, visible)}[REDACTED]`;
		});
	}
	return result;
}

/** Truncate text for logging */
export function truncate(text: string, maxLength = 200): string {
	if (text.length <= maxLength) return text;
	return `${text.slice(0, maxLength)}... [truncated]`;
}

/** Sanitize a filename for safe use in paths */
export function sanitizeFilename(name: string): string {
	return name
		.replace(/[/\\:*?"<>|]/g, "_")
		.replace(/\.\./g, "_")
		.slice(0, 100);
}
