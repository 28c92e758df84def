import { assertValidPackageName } from '../utils/package-name.js';
import { TemplateFetchFailedError } from './errors.js';
import { describeFetchError, type FetchFn } from './index-sync.js';
import type { LocalStore } from './local-store.js';
import type { ReviewPresenter } from './review-presenter.js';

/**
 * How the fetched template relates to the last-reviewed copy
 */
export type TemplateChange = 'new' | 'unchanged' | 'changed';

export interface ReviewResult {
  packageName: string;
  approved: boolean;
  /** False when the review was skipped; such content never becomes the baseline */
  reviewed: boolean;
  change: TemplateChange;
  /** Fetched template text; becomes the cached copy once committed */
  content: string;
}

/**
 * Ask the user a question and return the raw answer line.
 * Resolves to null when no answer could be read.
 */
export type ConfirmPrompt = (message: string) => Promise<string | null>;

export interface TemplateReviewOptions {
  store: LocalStore;
  /** URL template containing `{category}` and `{name}` */
  templateUrl: string;
  presenter: ReviewPresenter;
  prompt: ConfirmPrompt;
  fetch?: FetchFn;
  timeoutMs?: number;
  /** Skip rendering and prompting; every review is approved */
  assumeYes?: boolean;
}

export const CONFIRM_MESSAGE = 'Proceed with installation? [Y/n]';

export function buildTemplateUrl(template: string, category: string, name: string): string {
  return template
    .replaceAll('{category}', encodeURIComponent(category))
    .replaceAll('{name}', encodeURIComponent(name));
}

/**
 * Empty input defaults to yes; otherwise only y/yes (any case) approve.
 * A missing answer is a refusal.
 */
export function isAffirmative(answer: string | null): boolean {
  if (answer === null) {
    return false;
  }
  const normalized = answer.trim().toLowerCase();
  return normalized === '' || normalized === 'y' || normalized === 'yes';
}

/**
 * Compares a package's remote template with the last-reviewed copy and asks
 * the user whether to go ahead.
 *
 * The engine never updates the cached copy on its own: callers invoke
 * `commit()` once installation has actually happened, so a declined or
 * failed install leaves the review baseline untouched.
 */
export class TemplateReviewEngine {
  private readonly store: LocalStore;
  private readonly templateUrl: string;
  private readonly presenter: ReviewPresenter;
  private readonly prompt: ConfirmPrompt;
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number | undefined;
  private readonly assumeYes: boolean;

  constructor(options: TemplateReviewOptions) {
    this.store = options.store;
    this.templateUrl = options.templateUrl;
    this.presenter = options.presenter;
    this.prompt = options.prompt;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs;
    this.assumeYes = options.assumeYes ?? false;
  }

  /**
   * Fetch the current template. Any non-2xx status or transport failure is
   * a hard failure; there is no retry and no stale fallback.
   */
  async fetchTemplate(category: string, name: string): Promise<string> {
    const url = buildTemplateUrl(this.templateUrl, category, name);

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        ...(this.timeoutMs !== undefined && { signal: AbortSignal.timeout(this.timeoutMs) }),
      });
    } catch (error) {
      throw new TemplateFetchFailedError(name, url, undefined, {
        cause: new Error(describeFetchError(error, this.timeoutMs), { cause: error }),
      });
    }

    if (!response.ok) {
      throw new TemplateFetchFailedError(name, url, response.status);
    }

    try {
      return await response.text();
    } catch (error) {
      throw new TemplateFetchFailedError(name, url, undefined, { cause: error });
    }
  }

  async review(name: string, category: string): Promise<ReviewResult> {
    assertValidPackageName(name);

    const content = await this.fetchTemplate(category, name);
    const previous = await this.store.readTemplate(name);

    let change: TemplateChange;
    if (previous === null) {
      change = 'new';
    } else if (previous === content) {
      change = 'unchanged';
    } else {
      change = 'changed';
    }

    if (this.assumeYes) {
      return { packageName: name, approved: true, reviewed: false, change, content };
    }

    switch (change) {
      case 'new':
        await this.presenter.showFull(name, content);
        break;
      case 'unchanged':
        await this.presenter.showUnchanged(name);
        break;
      case 'changed':
        await this.presenter.showDiff(name, previous ?? '', content);
        break;
    }

    let answer: string | null;
    try {
      answer = await this.prompt(CONFIRM_MESSAGE);
    } catch {
      answer = null;
    }

    return { packageName: name, approved: isAffirmative(answer), reviewed: true, change, content };
  }

  /**
   * Record an approved template as the new review baseline. Declined and
   * skipped reviews are ignored.
   */
  async commit(result: ReviewResult): Promise<boolean> {
    if (!result.approved || !result.reviewed) {
      return false;
    }
    await this.store.writeTemplate(result.packageName, result.content);
    return true;
  }
}
