/**
 * Resolves the configured topic list into the scope of one recording.
 */

import { ALL_TOPICS_WILDCARD } from '../constants.js';
import { InvalidConfigError } from '../errors.js';

export interface TopicScope {
  /** Record every topic the bridge advertises, including ones that appear later. */
  recordAll: boolean;
  /** Topics to record when `recordAll` is false; always empty otherwise. */
  explicitTopics: ReadonlySet<string>;
}

export function resolveTopicScope(topics: readonly string[]): TopicScope {
  if (topics.length === 0) {
    throw new InvalidConfigError('loggedTopics must name at least one topic or "*"', ['loggedTopics: empty']);
  }

  if (topics[0] === ALL_TOPICS_WILDCARD) {
    if (topics.length > 1) {
      throw new InvalidConfigError(
        `"${ALL_TOPICS_WILDCARD}" must be the only entry in loggedTopics`,
        [`loggedTopics: wildcard mixed with ${topics.length - 1} topic name(s)`]
      );
    }
    return { recordAll: true, explicitTopics: new Set() };
  }

  const issues: string[] = [];
  topics.forEach((topic, i) => {
    if (topic === ALL_TOPICS_WILDCARD) {
      issues.push(`loggedTopics[${i}]: wildcard must be the only entry`);
    } else if (topic.trim() === '') {
      issues.push(`loggedTopics[${i}]: blank topic name`);
    }
  });
  if (issues.length > 0) {
    throw new InvalidConfigError(`Invalid loggedTopics: ${issues.join('; ')}`, issues);
  }

  return { recordAll: false, explicitTopics: new Set(topics) };
}

/** Whether a topic falls inside a scope. */
export function scopeIncludes(scope: TopicScope, topic: string): boolean {
  return scope.recordAll || scope.explicitTopics.has(topic);
}

export function describeScope(scope: TopicScope): string {
  return scope.recordAll ? 'all topics' : [...scope.explicitTopics].join(' ');
}
