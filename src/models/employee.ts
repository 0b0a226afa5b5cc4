import { z } from 'zod';
import type { CompanyRecord } from './company.js';

/**
 * Stored employee row. `companyId` is null only before assignment.
 */
export interface EmployeeRecord {
  id: number;
  name: string;
  email: string;
  position: string;
  companyId: number | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Employee together with its loaded company.
 */
export interface EmployeeWithCompany extends EmployeeRecord {
  company: CompanyRecord | null;
}

/**
 * Body of employee create and update requests.
 * The company is referenced by id only, never embedded.
 */
export const EmployeeRequestSchema = z.object({
  name: z.string().trim().min(1).max(255),
  email: z.email(),
  position: z.string().trim().min(1).max(255),
  companyId: z.number().int().positive(),
});

export type EmployeeRequest = z.infer<typeof EmployeeRequestSchema>;
