const TICKET_KEY = /[A-Z][A-Z0-9]+-\d+/;

/** First Jira-style key (`ABC-123`) in the given texts, or null. */
export function findTicketKey(...texts: Array<string | null | undefined>): string | null {
  const match = texts.filter((text): text is string => Boolean(text)).join('\n').match(TICKET_KEY);
  return match ? match[0] : null;
}

/** Browse URL when a Jira site is configured, otherwise the bare key. */
export function ticketLink(key: string, jiraBase?: string): string {
  return jiraBase ? `https://${jiraBase}.atlassian.net/browse/${key}` : key;
}
