import { z } from 'zod';

/**
 * Response shapes.
 *
 * A Full shape embeds the Simple shape of the related entity; a Simple shape
 * embeds nothing of its related entity. Every shape is therefore at most one
 * relation deep and the serialized graph cannot cycle.
 */

export const CompanySimpleSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  address: z.string(),
  createdAt: z.iso.datetime(),
  updatedAt: z.iso.datetime(),
});

export const EmployeeSimpleSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  email: z.string(),
  position: z.string(),
});

export const CompanyFullSchema = CompanySimpleSchema.extend({
  employees: z.array(EmployeeSimpleSchema),
});

export const EmployeeFullSchema = EmployeeSimpleSchema.extend({
  createdAt: z.iso.datetime(),
  updatedAt: z.iso.datetime(),
  company: CompanySimpleSchema.nullable(),
});

export type CompanySimple = z.infer<typeof CompanySimpleSchema>;
export type CompanyFull = z.infer<typeof CompanyFullSchema>;
export type EmployeeSimple = z.infer<typeof EmployeeSimpleSchema>;
export type EmployeeFull = z.infer<typeof EmployeeFullSchema>;
