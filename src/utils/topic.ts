const WILDCARDS = /[+#]/;

export function joinTopic(base: string, suffix: string): string {
  return `${base}/${suffix}`;
}

/**
 * Returns the single topic level that follows `base`, or null when the topic
 * does not sit directly under it.
 */
export function topicSuffix(base: string, topic: string): string | null {
  const prefix = `${base}/`;
  if (!topic.startsWith(prefix)) {
    return null;
  }
  const suffix = topic.slice(prefix.length);
  if (!suffix || suffix.includes('/') || WILDCARDS.test(suffix)) {
    return null;
  }
  return suffix;
}
