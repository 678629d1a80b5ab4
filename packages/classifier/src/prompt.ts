import type { RawPosting } from '@jobwatch/posting-sdk';

export const DEFAULT_PROMPT_TEMPLATE = `You are a job relevance filter. Check if the following job is relevant to the search: {search_term} and not for seniors.
Title: {title}
Company: {company}
Location: {location}
Description: {description}
Is this job related? Respond with only 'yes' or 'no'.`;

export const MAX_DESCRIPTION_LENGTH = 4000;

const PLACEHOLDER_PATTERN = /\{(search_term|title|company|location|description)\}/g;

export function renderPrompt(template: string, posting: RawPosting, searchTerm: string): string {
  const description = (posting.description ?? '').slice(0, MAX_DESCRIPTION_LENGTH);
  const values: Record<string, string> = {
    search_term: searchTerm,
    title: posting.title,
    company: posting.company,
    location: posting.location ?? '',
    description,
  };

  return template.replace(PLACEHOLDER_PATTERN, (_match, name: string) => values[name] ?? '');
}
