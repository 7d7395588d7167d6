import * as z from "zod";

export const createUserSchema = z.object({
  username: z
    .string()
    .min(1)
    .max(150)
    .regex(
      /^[\w.@+-]+$/,
      "Usernames may contain only letters, digits and @/./+/-/_ characters",
    ),
});

export type CreateUserInput = z.input<typeof createUserSchema>;
