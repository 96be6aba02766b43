import { z } from 'zod';

export const PetSpecSchema = z.object({
  name: z.string().min(1),
  level: z.number().int().min(1).max(3).optional(),
  attack: z.number().int().min(0).optional(),
  health: z.number().int().min(1).optional(),
  item: z.string().min(1).optional(),
});

export const TeamSchema = z.array(PetSpecSchema.nullable()).max(5);

export const BattleRequestSchema = z.object({
  seed: z.union([z.string().min(1), z.number().int()]).optional(),
  maxTurns: z.number().int().positive().optional(),
  teamA: TeamSchema,
  teamB: TeamSchema,
});
