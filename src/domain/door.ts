import { z } from 'zod';
import { ValidationError } from './errors.js';

export const DOORS = [1, 2, 3] as const;

export const DoorContentSchema = z.enum(['decoy', 'reward']);

export const DoorIndexSchema = z.union([z.literal(1), z.literal(2), z.literal(3)]);

/**
 * What sits behind doors 1..3, in door order. Door `d` is element `d - 1`.
 */
export const GameAssignmentSchema = z
  .tuple([DoorContentSchema, DoorContentSchema, DoorContentSchema])
  .refine(game => game.filter(c => c === 'reward').length === 1, {
    message: 'game must hide exactly one reward',
  });

export type DoorContent = z.infer<typeof DoorContentSchema>;
export type DoorIndex = z.infer<typeof DoorIndexSchema>;
export type GameAssignment = Readonly<z.infer<typeof GameAssignmentSchema>>;

export function parseGame(game: unknown): GameAssignment {
  const parsed = GameAssignmentSchema.safeParse(game);
  if (!parsed.success) throw ValidationError.fromZod('Invalid game assignment', parsed.error);
  return parsed.data;
}

export function parseDoor(door: unknown, label = 'door'): DoorIndex {
  const parsed = DoorIndexSchema.safeParse(door);
  if (!parsed.success) throw new ValidationError(`Invalid ${label} (expected 1, 2 or 3): ${String(door)}`);
  return parsed.data;
}

export function contentAt(game: GameAssignment, door: DoorIndex): DoorContent {
  return game[door - 1];
}
