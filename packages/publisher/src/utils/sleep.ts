/**
 * Resolve after `ms` milliseconds
 */
export function sleep(ms: number): Promise<void> {
	return new Promise(resolve => {
		setTimeout(resolve, ms)
	})
}
