import { z } from 'zod';

const TRUSTED_LEAFLET_DOMAINS = [
  'geneesmiddeleninformatiebank.nl',
  'cbg-meb.nl',
  'farmacotherapeutischkompas.nl',
  'apotheek.nl',
  'rijksoverheid.nl',
];

/** Blank is allowed; otherwise an http(s) URL on a trusted host or one of its subdomains. */
export function leafletUrlProblem(url: string | undefined): string | undefined {
  if (!url) return undefined;
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return 'Invalid URL format. Must be a valid HTTP or HTTPS URL.';
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return 'Invalid URL format. Must be a valid HTTP or HTTPS URL.';
  }
  const host = parsed.hostname.toLowerCase();
  const trusted = TRUSTED_LEAFLET_DOMAINS.some((domain) => host === domain || host.endsWith(`.${domain}`));
  return trusted ? undefined : 'URL must be from a trusted domain (e.g., geneesmiddeleninformatiebank.nl, cbg-meb.nl).';
}

export const medicineInputSchema = z
  .object({
    name: z.string().trim().min(1, 'Name cannot be empty'),
    dose: z.number().finite(),
    unit: z.string().trim().min(1, 'Unit cannot be empty'),
    stock: z.number().finite(),
    description: z.string().optional(),
    bijsluiter: z.string().optional(),
  })
  .superRefine((value, ctx) => {
    const problem = leafletUrlProblem(value.bijsluiter);
    if (problem) ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['bijsluiter'], message: problem });
  });
export type MedicineInput = z.infer<typeof medicineInputSchema>;

export const addStockSchema = z.object({
  amount: z.number().finite(),
});

export const lowStockQuerySchema = z.object({
  threshold: z.coerce.number().finite().default(10),
});

export const expiryQuerySchema = z.object({
  asOf: z.string().optional(),
});
