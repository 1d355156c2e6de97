/**
 * TUI Session
 *
 * Line-driven state machine behind the interactive search; the readline
 * loop in tui.ts only feeds it input and prints what it returns.
 *
 *   area → keyword → sort → results ⇄ detail
 *
 * In results: a number shows that restaurant, `n` starts a new search,
 * `q` quits. `q` also quits from any prompt.
 */

import { toUserMessage } from '../lib/errors/user-message.js';
import type { RestaurantSearchService } from '../services/tabelog/search.service.js';
import { SORT_KEYS, type RestaurantRecord, type SearchFilterInput, type SortKey } from '../services/tabelog/types.js';
import { formatRestaurantDetail, formatRestaurantTable } from '../cli/format.js';

export type SessionState = 'area' | 'keyword' | 'sort' | 'results' | 'done';

export interface SessionStep {
  output: string[];
  prompt: string;
  done: boolean;
}

const PROMPTS: Readonly<Record<SessionState, string>> = {
  area: 'Area (e.g. 東京, 大阪府; blank for all of Japan): ',
  keyword: 'Keyword (blank to skip): ',
  sort: `Sort (${SORT_KEYS.map((key, i) => `${i + 1}=${key}`).join(' ')}; blank = ranking): `,
  results: 'Number for details, n = new search, q = quit: ',
  done: '',
};

export class TuiSession {
  private state: SessionState = 'area';
  private draft: SearchFilterInput = {};
  private results: readonly RestaurantRecord[] = [];

  constructor(
    private readonly service: RestaurantSearchService,
    private readonly limit: number = 20
  ) {}

  get currentState(): SessionState {
    return this.state;
  }

  get prompt(): string {
    return PROMPTS[this.state];
  }

  async handle(line: string): Promise<SessionStep> {
    const input = line.trim();
    if (input.toLowerCase() === 'q') {
      return this.transition('done', ['Bye.']);
    }

    switch (this.state) {
      case 'area':
        this.draft = { limit: this.limit };
        if (input) this.draft.area = input;
        return this.transition('keyword');
      case 'keyword':
        if (input) this.draft.keyword = input;
        return this.transition('sort');
      case 'sort': {
        const sort = parseSort(input);
        if (sort === null) {
          return this.transition('sort', [`Unknown sort "${input}".`]);
        }
        this.draft.sort = sort;
        return this.search();
      }
      case 'results':
        return this.handleResults(input);
      case 'done':
        return this.transition('done');
    }
  }

  private async search(): Promise<SessionStep> {
    try {
      const result = await this.service.searchRestaurants(this.draft);
      this.results = result.restaurants;
    } catch (error) {
      return this.transition('area', [toUserMessage(error)]);
    }
    if (this.results.length === 0) {
      return this.transition('area', ['No restaurants found. Try another search.']);
    }
    return this.transition('results', formatRestaurantTable(this.results));
  }

  private handleResults(input: string): SessionStep {
    if (input.toLowerCase() === 'n') {
      this.results = [];
      return this.transition('area');
    }
    const index = /^\d+$/.test(input) ? Number.parseInt(input, 10) - 1 : -1;
    const restaurant = this.results[index];
    if (restaurant === undefined) {
      return this.transition('results', [`Enter a number between 1 and ${this.results.length}.`]);
    }
    return this.transition('results', formatRestaurantDetail(restaurant));
  }

  private transition(next: SessionState, output: string[] = []): SessionStep {
    this.state = next;
    return { output, prompt: PROMPTS[next], done: next === 'done' };
  }
}

function parseSort(input: string): SortKey | null {
  if (!input) return 'ranking';
  const byNumber = /^\d+$/.test(input) ? SORT_KEYS[Number.parseInt(input, 10) - 1] : undefined;
  if (byNumber !== undefined) return byNumber;
  return SORT_KEYS.find((key) => key === input.toLowerCase()) ?? null;
}
