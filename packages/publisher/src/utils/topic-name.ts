/**
 * Topic resource names
 */

const TOPIC_RESOURCE = /^projects\/([^/]+)\/topics\/([^/]+)$/

/**
 * Format a topic as `projects/{projectId}/topics/{topic}`. A topic that is
 * already a full resource name is returned unchanged.
 */
export function fullTopicName(projectId: string, topic: string): string {
	if (TOPIC_RESOURCE.test(topic)) {
		return topic
	}
	return `projects/${projectId}/topics/${topic}`
}

/**
 * Split a full topic resource name, or return null if it is not one
 */
export function parseTopicName(name: string): { projectId: string; topic: string } | null {
	const match = TOPIC_RESOURCE.exec(name)
	if (!match?.[1] || !match[2]) {
		return null
	}
	return { projectId: match[1], topic: match[2] }
}
