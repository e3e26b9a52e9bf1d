import { z } from 'zod';

export const chartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          meta: z.object({
            symbol: z.string(),
            currency: z.string().nullish(),
            regularMarketPrice: z.number().nonnegative(),
            previousClose: z.number().nonnegative().nullish(),
            chartPreviousClose: z.number().nonnegative().nullish(),
            longName: z.string().nullish(),
            shortName: z.string().nullish(),
          }),
        }),
      )
      .nullish(),
    error: z
      .object({
        code: z.string(),
        description: z.string().nullish(),
      })
      .nullish(),
  }),
});

export type ChartResponse = z.infer<typeof chartResponseSchema>;

export interface IChartMeta {
  readonly symbol: string;
  readonly currency: string | null;
  readonly regularMarketPrice: number;
  readonly previousClose: number | null;
  readonly displayName: string | null;
}
