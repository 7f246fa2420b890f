import { z } from 'zod';

const CoordinateSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
});

const RegionSchema = z.object({
  p_min: CoordinateSchema,
  p_max: CoordinateSchema,
});

// `null` is accepted wherever a field is optional and means "not given".
export const CropDescriptionSchema = z.object({
  region: RegionSchema,
  category: z.number().int().nullish(),
  one_of_groups: z.array(z.number().int()).nullish(),
  proper: z.boolean().nullish(),
});

export const OperandListSchema = z.array(z.unknown()).min(1, 'operand list must not be empty');
