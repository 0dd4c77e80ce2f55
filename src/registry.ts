import fs from 'fs';
import { z } from 'zod';
import { ConfigError } from './errors';

export const SOURCE_FAMILIES = [
  'greenhouse',
  'lever',
  'ashby',
  'workable',
  'smartrecruiters',
  'amazon',
  'workday',
  'successfactors',
  'email_alert',
  'manual',
] as const;

export type SourceFamily = (typeof SOURCE_FAMILIES)[number];

const companySchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  sourceFamily: z.enum(SOURCE_FAMILIES),
  sourceIdentifier: z.string().default(''),
  knownVisaSponsor: z.boolean().default(false),
  ethicsRating: z.string().default('neutral'),
  notes: z.string().default(''),
  options: z
    .object({
      country: z.string().optional(),
      queries: z.array(z.string()).optional(),
      location: z.string().optional(),
      fetchDetails: z.boolean().optional(),
    })
    .default({}),
});

const registrySchema = z.object({ companies: z.array(companySchema) });

export type Company = z.infer<typeof companySchema>;

export function parseCompanies(data: unknown): Company[] {
  const parsed = registrySchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(`Invalid company registry: ${parsed.error.issues[0]?.message ?? 'unknown error'}`);
  }
  return parsed.data.companies;
}

export function loadCompanies(file: string): Company[] {
  if (!fs.existsSync(file)) {
    throw new ConfigError(`Companies file not found: ${file}`);
  }
  return parseCompanies(JSON.parse(fs.readFileSync(file, 'utf-8')));
}

export function companyIndex(companies: Company[]): Map<string, Company> {
  return new Map(companies.map(company => [company.id, company]));
}
