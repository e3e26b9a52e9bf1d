import type { QuoteCurrency } from '../../../common/interfaces/pricing/price-quote.interfaces';

export enum ParseFailureReason {
  EMPTY_INPUT = 'empty_input',
  NO_RULE_MATCHED = 'no_rule_matched',
  CONFLICTING_CURRENCY = 'conflicting_currency',
  NOT_FINITE = 'not_finite',
  ELEMENT_NOT_FOUND = 'element_not_found',
  NO_AMOUNT_IN_ELEMENT = 'no_amount_in_element',
}

export type ParseSuccess<T> = {
  readonly ok: true;
  readonly value: T;
  readonly rule: string;
};

export type ParseFailure = {
  readonly ok: false;
  readonly reason: ParseFailureReason;
  readonly raw: string;
};

export type ParseResult<T> = ParseSuccess<T> | ParseFailure;

export interface ICurrencyAmount {
  readonly amount: number;
  readonly currency: QuoteCurrency | null;
}

type AmountRule = {
  readonly name: string;
  readonly pattern: RegExp;
  readonly currency: QuoteCurrency | null;
};

const NUMBER_BODY = '(?<integer>\\d{1,3}(?:,\\d{3})+|\\d+)(?:\\.(?<fraction>\\d+))?';
const YEN_SUFFIX = '(?:円|JPY)';
const USD_SUFFIX = '(?:USD|ドル)';

const AMOUNT_RULES: readonly AmountRule[] = [
  {
    name: 'yen_prefix',
    pattern: new RegExp(`^(?<lead>[+-])?¥\\s*(?<inner>[+-])?${NUMBER_BODY}$`),
    currency: 'JPY',
  },
  {
    name: 'yen_suffix',
    pattern: new RegExp(`^(?<lead>[+-])?${NUMBER_BODY}\\s*${YEN_SUFFIX}$`),
    currency: 'JPY',
  },
  {
    name: 'usd_prefix',
    pattern: new RegExp(`^(?<lead>[+-])?(?:US)?\\$\\s*(?<inner>[+-])?${NUMBER_BODY}$`),
    currency: 'USD',
  },
  {
    name: 'usd_suffix',
    pattern: new RegExp(`^(?<lead>[+-])?${NUMBER_BODY}\\s*${USD_SUFFIX}$`),
    currency: 'USD',
  },
  {
    name: 'plain_number',
    pattern: new RegExp(`^(?<lead>[+-])?${NUMBER_BODY}$`),
    currency: null,
  },
];

const YEN_MARKER: RegExp = /¥|円|JPY/;
const USD_MARKER: RegExp = /\$|USD|ドル/;
const AMOUNT_TOKEN: RegExp =
  /(?<![\w.,])(?:(?:US)?\$|¥)?\s*[+-]?\d[\d,]*(?:\.\d+)?(?![\d.,])(?:\s*(?:円|JPY|USD|ドル))?(?!\s*%)/g;
const PERCENT_TOKEN: RegExp = /(?<![\d.])(?<value>[+-]?\d+(?:\.\d+)?)\s*%/;

/**
 * Folds full-width forms (`１２３`, `￥`, `％`) to ASCII, maps the Unicode minus
 * sign to `-` and collapses whitespace.
 */
export const normalizePriceText = (raw: string): string =>
  raw
    .normalize('NFKC')
    .replace(/[−‒–]/g, '-')
    .replace(/\s+/g, ' ')
    .trim();

export const parseCurrencyAmount = (raw: string): ParseResult<ICurrencyAmount> => {
  const text: string = normalizePriceText(raw);

  if (text.length === 0) {
    return { ok: false, reason: ParseFailureReason.EMPTY_INPUT, raw };
  }

  if (YEN_MARKER.test(text) && USD_MARKER.test(text)) {
    return { ok: false, reason: ParseFailureReason.CONFLICTING_CURRENCY, raw };
  }

  for (const rule of AMOUNT_RULES) {
    const match: RegExpExecArray | null = rule.pattern.exec(text);

    if (match === null) {
      continue;
    }

    const amount: number | null = toSignedNumber(match.groups);

    if (amount === null) {
      return { ok: false, reason: ParseFailureReason.NOT_FINITE, raw };
    }

    return { ok: true, value: { amount, currency: rule.currency }, rule: rule.name };
  }

  return { ok: false, reason: ParseFailureReason.NO_RULE_MATCHED, raw };
};

/** First well-formed amount inside free text; percentages are skipped. */
export const scanCurrencyAmount = (raw: string): ParseResult<ICurrencyAmount> => {
  const text: string = normalizePriceText(raw);

  if (text.length === 0) {
    return { ok: false, reason: ParseFailureReason.EMPTY_INPUT, raw };
  }

  for (const match of text.matchAll(AMOUNT_TOKEN)) {
    const parsed: ParseResult<ICurrencyAmount> = parseCurrencyAmount(match[0]);

    if (parsed.ok) {
      return { ok: true, value: parsed.value, rule: `scan:${parsed.rule}` };
    }
  }

  return { ok: false, reason: ParseFailureReason.NO_RULE_MATCHED, raw };
};

export const parsePercentDelta = (raw: string): ParseResult<number> => {
  const text: string = normalizePriceText(raw);
  const match: RegExpExecArray | null = PERCENT_TOKEN.exec(text);
  const rawValue: string | undefined = match?.groups?.['value'];

  if (rawValue === undefined) {
    return {
      ok: false,
      reason: text.length === 0 ? ParseFailureReason.EMPTY_INPUT : ParseFailureReason.NO_RULE_MATCHED,
      raw,
    };
  }

  const value: number = Number.parseFloat(rawValue);

  if (!Number.isFinite(value)) {
    return { ok: false, reason: ParseFailureReason.NOT_FINITE, raw };
  }

  return { ok: true, value, rule: 'percent_delta' };
};

const toSignedNumber = (groups: Record<string, string | undefined> | undefined): number | null => {
  const integerPart: string | undefined = groups?.['integer'];

  if (integerPart === undefined) {
    return null;
  }

  const fractionPart: string | undefined = groups?.['fraction'];
  const negative: boolean = groups?.['lead'] === '-' || groups?.['inner'] === '-';
  const digits: string = integerPart.replace(/,/g, '');
  const unsigned: number = Number.parseFloat(
    fractionPart === undefined ? digits : `${digits}.${fractionPart}`,
  );

  if (!Number.isFinite(unsigned)) {
    return null;
  }

  return negative ? -unsigned : unsigned;
};
