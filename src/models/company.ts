import { z } from 'zod';
import type { EmployeeRecord } from './employee.js';

/**
 * Stored company row.
 */
export interface CompanyRecord {
  id: number;
  name: string;
  address: string;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Company together with the employees loaded for it, ordered by id.
 */
export interface CompanyWithEmployees extends CompanyRecord {
  employees: EmployeeRecord[];
}

/**
 * Body of company create and update requests. No relation fields.
 */
export const CompanyRequestSchema = z.object({
  name: z.string().trim().min(1).max(255),
  address: z.string().trim().min(1).max(255),
});

export type CompanyRequest = z.infer<typeof CompanyRequestSchema>;
