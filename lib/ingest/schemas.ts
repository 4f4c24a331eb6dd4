import { z } from "zod";

// Decimal or exponent notation only; no 0x/0b/0o literals
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// Cell coercion. Anything that is not a finite number becomes null; never throws.
export const toOptNum = z
  .union([z.number(), z.string(), z.null(), z.undefined()])
  .transform((v) => {
    if (v === null || v === undefined) return null;
    if (typeof v === "number") return Number.isFinite(v) ? v : null;
    const s = v.trim();
    if (!DECIMAL.test(s)) return null;
    const n = Number(s);
    return Number.isFinite(n) ? n : null;
  })
  .nullable();

export const toOptStr = z
  .union([z.string(), z.number(), z.null(), z.undefined()])
  .transform((v) => {
    if (v === null || v === undefined) return null;
    const s = String(v).trim();
    return s === "" ? null : s;
  })
  .nullable();

export function coerceNumber(raw: unknown): number | null {
  const parsed = toOptNum.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function coerceText(raw: unknown): string | null {
  const parsed = toOptStr.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
}
