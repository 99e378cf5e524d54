import { describe, it, expect, vi } from 'vitest';
import type { Page, Locator as PwLocator } from 'playwright';
import { PlaywrightUiQuery, isObstructedError, HANDLE_ATTRIBUTE } from '../playwright-query';
import { TokenTapStrategy } from '../../strategies/token-tap';
import { css, byText, byRole } from '../locators';
import { InfrastructureError } from '../../errors';

const OBSTRUCTED = new Error(
  'locator.click: Timeout 2000ms exceeded.\n  - <div class="overlay"></div> intercepts pointer events'
);
const CLOSED = new Error('locator.count: Target page, context or browser has been closed');

function mockLocator(count = 1, selector = '') {
  return {
    selector,
    evaluateAll: vi.fn(async () => count),
    scrollIntoViewIfNeeded: vi.fn(async () => {}),
    click: vi.fn(async () => {}),
    fill: vi.fn(async () => {}),
    press: vi.fn(async () => {}),
    dispatchEvent: vi.fn(async () => {}),
  };
}

type MockLocator = ReturnType<typeof mockLocator>;

function mockPage(bySelector: Record<string, MockLocator>, byRoleName: Record<string, MockLocator> = {}) {
  return {
    locator: vi.fn((selector: string) => bySelector[selector] ?? mockLocator(0, selector)),
    getByRole: vi.fn((role: string, options?: { name?: string }) =>
      byRoleName[`${role}:${options?.name ?? ''}`] ?? mockLocator(0)),
  };
}

function query(page: ReturnType<typeof mockPage>) {
  return new PlaywrightUiQuery(page as unknown as Page, { quiet: true });
}

function pinned(tag: string): string {
  return `[${HANDLE_ATTRIBUTE}="${tag}"]`;
}

function handle(locator: MockLocator): PwLocator {
  return locator as unknown as PwLocator;
}

describe('PlaywrightUiQuery.findFirst', () => {
  it('should return the first element of the first matching locator', async () => {
    const hit = mockLocator(2);
    const page = mockPage({ '.hit': hit });

    const result = await query(page).findFirst([css('.miss'), css('.hit'), css('.later')]);

    expect(result).toMatchObject({ selector: pinned('q2-0') });
    expect(page.locator.mock.calls.map(c => c[0])).toEqual(['.miss', '.hit', pinned('q2-0'), pinned('q2-1')]);
  });

  it('should resolve text locators to buttons by accessible name', async () => {
    const next = mockLocator(1);
    const page = mockPage({}, { 'button:Next': next });

    const result = await query(page).findFirst([byText('Next', false)]);

    expect(result).toMatchObject({ selector: pinned('q1-0') });
    expect(page.getByRole).toHaveBeenCalledWith('button', { name: 'Next', exact: false });
  });

  it('should resolve role locators without a name', async () => {
    const page = mockPage({});
    await query(page).findFirst([byRole('radio')]);
    expect(page.getByRole).toHaveBeenCalledWith('radio');
  });

  it('should return null when nothing matches', async () => {
    expect(await query(mockPage({})).findFirst([css('.a'), css('.b')])).toBeNull();
  });

  it('should treat a failing query as no match', async () => {
    const broken = mockLocator();
    broken.evaluateAll.mockRejectedValue(new Error('Unexpected token "]" while parsing selector'));
    expect(await query(mockPage({ '.bad': broken })).findFirst([css('.bad')])).toBeNull();
  });

  it('should surface a closed browser as InfrastructureError', async () => {
    const gone = mockLocator();
    gone.evaluateAll.mockRejectedValue(CLOSED);
    await expect(query(mockPage({ '.x': gone })).findFirst([css('.x')])).rejects.toBeInstanceOf(InfrastructureError);
  });
});

describe('PlaywrightUiQuery.findAll', () => {
  it('should return one node-bound handle per match', async () => {
    const tokens = mockLocator(3);
    const result = await query(mockPage({ '.token': tokens })).findAll(css('.token'));

    expect(tokens.evaluateAll).toHaveBeenCalledWith(expect.any(Function), { attribute: HANDLE_ATTRIBUTE, tag: 'q1' });
    expect(result.map(h => (h as unknown as MockLocator).selector)).toEqual([pinned('q1-0'), pinned('q1-1'), pinned('q1-2')]);
  });

  it('should use a fresh tag for every query', async () => {
    const ui = query(mockPage({ '.token': mockLocator(1) }));

    await ui.findAll(css('.token'));
    const second = await ui.findAll(css('.token'));

    expect(second).toMatchObject([{ selector: pinned('q2-0') }]);
  });

  it('should return an empty list for zero matches', async () => {
    expect(await query(mockPage({})).findAll(css('.token'))).toEqual([]);
  });
});

describe('PlaywrightUiQuery.safeAct', () => {
  it('should scroll into view then click', async () => {
    const button = mockLocator();

    expect(await query(mockPage({})).safeAct(handle(button), { kind: 'click' })).toBe(true);
    expect(button.scrollIntoViewIfNeeded).toHaveBeenCalled();
    expect(button.click).toHaveBeenCalledWith({ timeout: 2000 });
    expect(button.dispatchEvent).not.toHaveBeenCalled();
  });

  it('should retry an obstructed click once with a forced dispatch', async () => {
    const button = mockLocator();
    button.click.mockRejectedValue(OBSTRUCTED);

    expect(await query(mockPage({})).safeAct(handle(button), { kind: 'click' })).toBe(true);
    expect(button.dispatchEvent).toHaveBeenCalledTimes(1);
    expect(button.dispatchEvent).toHaveBeenCalledWith('click', undefined, { timeout: 2000 });
  });

  it('should report false when the forced dispatch also fails', async () => {
    const button = mockLocator();
    button.click.mockRejectedValue(OBSTRUCTED);
    button.dispatchEvent.mockRejectedValue(new Error('Element is not attached to the DOM'));

    expect(await query(mockPage({})).safeAct(handle(button), { kind: 'click' })).toBe(false);
  });

  it('should not force anything for a non-obstruction failure', async () => {
    const button = mockLocator();
    button.click.mockRejectedValue(new Error('Element is not attached to the DOM'));

    expect(await query(mockPage({})).safeAct(handle(button), { kind: 'click' })).toBe(false);
    expect(button.dispatchEvent).not.toHaveBeenCalled();
  });

  it('should fill and press the submit key for type actions', async () => {
    const input = mockLocator();

    const ok = await query(mockPage({})).safeAct(handle(input), { kind: 'type', text: 'a', submitKey: 'Enter' });

    expect(ok).toBe(true);
    expect(input.fill).toHaveBeenCalledWith('a', { timeout: 2000 });
    expect(input.press).toHaveBeenCalledWith('Enter', { timeout: 2000 });
  });

  it('should count the fill as done when the submit key press fails', async () => {
    const input = mockLocator();
    input.press.mockRejectedValue(new Error('locator.press: Timeout 2000ms exceeded.'));

    const ok = await query(mockPage({})).safeAct(handle(input), { kind: 'type', text: 'a', submitKey: 'Enter' });

    expect(ok).toBe(true);
    expect(input.fill).toHaveBeenCalledTimes(1);
  });

  it('should force the fill when the input is obstructed', async () => {
    const input = mockLocator();
    input.fill.mockRejectedValueOnce(OBSTRUCTED);

    const ok = await query(mockPage({})).safeAct(handle(input), { kind: 'type', text: 'a' });

    expect(ok).toBe(true);
    expect(input.fill).toHaveBeenLastCalledWith('a', { timeout: 2000, force: true });
    expect(input.press).not.toHaveBeenCalled();
  });

  it('should throw InfrastructureError when the browser is gone', async () => {
    const button = mockLocator();
    button.click.mockRejectedValue(new Error('locator.click: Browser has been closed'));

    await expect(query(mockPage({})).safeAct(handle(button), { kind: 'click' })).rejects.toBeInstanceOf(InfrastructureError);
  });
});

interface BankNode {
  text: string;
  attributes: Record<string, string>;
  setAttribute(name: string, value: string): void;
}

type PinArgs = { attribute: string; tag: string };

/** A word bank whose tapped tokens leave the list, as the live player does. */
function shrinkingBank(words: string[]) {
  const bankSelector = "[data-test='word-bank'] [role='button']";
  const nodes: BankNode[] = words.map(text => {
    const attributes: Record<string, string> = {};
    return { text, attributes, setAttribute: (name: string, value: string) => { attributes[name] = value; } };
  });
  const tapped: string[] = [];

  const locator = (selector: string) => {
    if (selector === bankSelector) {
      return { evaluateAll: async (fn: (els: BankNode[], arg: PinArgs) => number, arg: PinArgs) => fn(nodes, arg) };
    }
    const tag = /^\[data-autopilot-handle="(.+)"\]$/.exec(selector)?.[1];
    if (tag === undefined) return { evaluateAll: async () => 0 };

    const find = () => nodes.find(n => n.attributes[HANDLE_ATTRIBUTE] === tag);
    return {
      scrollIntoViewIfNeeded: async () => {
        if (!find()) throw new Error('locator.scrollIntoViewIfNeeded: Timeout 2000ms exceeded.');
      },
      click: async () => {
        const node = find();
        if (!node) throw new Error('locator.click: Timeout 2000ms exceeded.');
        tapped.push(node.text);
        nodes.splice(nodes.indexOf(node), 1);
      },
    };
  };

  return { page: { locator }, nodes, tapped };
}

describe('PlaywrightUiQuery with a re-rendering word bank', () => {
  it('should tap every token while the bank shrinks', async () => {
    const bank = shrinkingBank(['ich', 'bin', 'ein', 'Berliner']);
    const ui = new PlaywrightUiQuery(bank.page as unknown as Page, { quiet: true });

    const outcome = await new TokenTapStrategy({ sleep: async () => {} }).attempt(ui);

    expect(outcome).toBe('acted');
    expect(bank.tapped).toEqual(['ich', 'bin', 'ein', 'Berliner']);
    expect(bank.nodes).toEqual([]);
  });

  it('should report a handle whose node has left as a failed action', async () => {
    const bank = shrinkingBank(['ich', 'bin']);
    const ui = new PlaywrightUiQuery(bank.page as unknown as Page, { quiet: true });
    const [first] = await ui.findAll(css("[data-test='word-bank'] [role='button']"));

    expect(await ui.safeAct(first, { kind: 'click' })).toBe(true);
    expect(await ui.safeAct(first, { kind: 'click' })).toBe(false);
    expect(bank.tapped).toEqual(['ich']);
  });
});

describe('isObstructedError', () => {
  it('should recognize pointer interception', () => {
    expect(isObstructedError(OBSTRUCTED)).toBe(true);
    expect(isObstructedError(new Error('Element is not visible'))).toBe(false);
  });
});
