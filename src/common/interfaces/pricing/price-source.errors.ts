import type { AssetKind } from './asset-kind.interfaces';

export enum PriceErrorCode {
  SOURCE_UNREACHABLE = 'source_unreachable',
  PARSE_FAILURE = 'parse_failure',
  UNSUPPORTED_ASSET = 'unsupported_asset',
  PRICE_UNAVAILABLE = 'price_unavailable',
}

const RAW_SNIPPET_MAX_LENGTH = 200;

export class SourceUnreachableError extends Error {
  public readonly code: PriceErrorCode.SOURCE_UNREACHABLE = PriceErrorCode.SOURCE_UNREACHABLE;

  public constructor(
    public readonly source: string,
    message: string,
    public readonly httpStatus: number | null = null,
  ) {
    super(`${source}: ${message}`);
    this.name = 'SourceUnreachableError';
  }
}

export class ParseFailureError extends Error {
  public readonly code: PriceErrorCode.PARSE_FAILURE = PriceErrorCode.PARSE_FAILURE;
  public readonly rawSnippet: string;

  public constructor(
    public readonly source: string,
    message: string,
    raw: string,
  ) {
    super(`${source}: ${message}`);
    this.name = 'ParseFailureError';
    this.rawSnippet = truncateSnippet(raw);
  }
}

export class UnsupportedAssetError extends Error {
  public readonly code: PriceErrorCode.UNSUPPORTED_ASSET = PriceErrorCode.UNSUPPORTED_ASSET;

  public constructor(
    public readonly kind: AssetKind,
    public readonly identifier: string,
  ) {
    super(`Unsupported asset kind=${kind} identifier=${identifier}`);
    this.name = 'UnsupportedAssetError';
  }
}

export type PriceSourceError = SourceUnreachableError | ParseFailureError | UnsupportedAssetError;

export class PriceUnavailableError extends Error {
  public readonly code: PriceErrorCode.PRICE_UNAVAILABLE = PriceErrorCode.PRICE_UNAVAILABLE;

  public constructor(
    public readonly kind: AssetKind,
    public readonly identifier: string,
    public readonly lastError: PriceSourceError,
    public readonly attempts: number,
  ) {
    super(
      `Price unavailable kind=${kind} identifier=${identifier} attempts=${String(attempts)}: ${lastError.message}`,
    );
    this.name = 'PriceUnavailableError';
  }
}

export const isPriceSourceError = (error: unknown): error is PriceSourceError =>
  error instanceof SourceUnreachableError ||
  error instanceof ParseFailureError ||
  error instanceof UnsupportedAssetError;

const truncateSnippet = (raw: string): string => {
  const collapsed: string = raw.replace(/\s+/g, ' ').trim();

  return collapsed.length > RAW_SNIPPET_MAX_LENGTH
    ? `${collapsed.slice(0, RAW_SNIPPET_MAX_LENGTH)}...`
    : collapsed;
};
