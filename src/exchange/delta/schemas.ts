import { z } from 'zod';

/** Delta는 숫자를 문자열로 주는 필드가 많다 */
const numeric = z.union([z.string(), z.number()]).transform((v) => Number(v));
const optionalNumeric = z
  .union([z.string(), z.number()])
  .nullable()
  .optional()
  .transform((v) => (v === null || v === undefined || v === '' ? null : Number(v)));

/** 성공 응답 공통 봉투: { success: true, result } */
export function envelope<T extends z.ZodTypeAny>(result: T) {
  return z.object({
    success: z.literal(true),
    result,
  });
}

/** 실패 응답: { success: false, error: { code, context } } */
export const errorEnvelopeSchema = z.object({
  success: z.literal(false).optional(),
  error: z.object({
    code: z.string(),
    context: z.unknown().optional(),
  }),
});

// ─── PUBLIC ───────────────────────────────────────────────────────────────

export const productSchema = z.object({
  id: z.number(),
  symbol: z.string(),
  contract_type: z.string(),
  strike_price: optionalNumeric,
  settlement_time: z.string().nullable().optional(),
  tick_size: numeric,
  contract_value: numeric,
  state: z.string().optional(),
  underlying_asset: z.object({ symbol: z.string() }),
});
export type DeltaProduct = z.infer<typeof productSchema>;
export const productsSchema = envelope(z.array(productSchema));

export const tickerSchema = z.object({
  symbol: z.string(),
  mark_price: optionalNumeric,
  spot_price: optionalNumeric,
});
export const tickerResponseSchema = envelope(tickerSchema);
export const tickersResponseSchema = envelope(z.array(tickerSchema));

// ─── PRIVATE ──────────────────────────────────────────────────────────────

export const orderSchema = z.object({
  id: z.union([z.number(), z.string()]).transform((v) => String(v)),
  client_order_id: z.string().nullable().optional(),
  product_symbol: z.string().optional(),
  size: numeric,
  unfilled_size: numeric,
  state: z.string(),
  average_fill_price: optionalNumeric,
  side: z.enum(['buy', 'sell']).optional(),
});
export type DeltaOrder = z.infer<typeof orderSchema>;
export const orderResponseSchema = envelope(orderSchema);

export const positionSchema = z.object({
  product_symbol: z.string(),
  size: numeric,
  entry_price: optionalNumeric,
});
export const positionsResponseSchema = envelope(z.array(positionSchema));
