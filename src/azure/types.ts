import { z } from "zod";

export const subscriptionSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
});

export const subscriptionListSchema = z.array(subscriptionSchema);

export const resourceGroupSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  location: z.string().optional(),
});

export const resourceGroupListSchema = z.array(resourceGroupSchema);

export type AzureSubscription = z.infer<typeof subscriptionSchema>;
export type AzureResourceGroup = z.infer<typeof resourceGroupSchema>;

export type ListResult<T> = { ok: true; items: T[] } | { ok: false; error: string };
