import z from 'zod';

export const cityJsonSchema = z.object({
    name: z.string().min(1),
    longitude: z.number().finite(),
    latitude: z.number().finite(),
});

export type City = z.infer<typeof cityJsonSchema>;

export const citiesJsonSchema = cityJsonSchema
    .array()
    .min(2)
    .superRefine((cities, ctx) => {
        const seen = new Set<string>();
        cities.forEach((city, index) => {
            if (seen.has(city.name)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: [index, 'name'],
                    message: `Duplicate city name "${city.name}"`,
                });
            }
            seen.add(city.name);
        });
    });

export type Cities = z.infer<typeof citiesJsonSchema>;
