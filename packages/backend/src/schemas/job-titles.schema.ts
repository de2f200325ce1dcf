import { z } from 'zod';

export const CreateJobTitleSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(255),
  shortName: z.string().trim().max(100).optional().nullable(),
});

export type CreateJobTitleInput = z.infer<typeof CreateJobTitleSchema>;

export const UpdateJobTitleSchema = CreateJobTitleSchema.partial();

export type UpdateJobTitleInput = z.infer<typeof UpdateJobTitleSchema>;

export const JobTitleFiltersSchema = z.object({
  search: z.string().trim().min(1).optional(),
});

export type JobTitleFiltersInput = z.infer<typeof JobTitleFiltersSchema>;
