import z from 'zod';

export const maskCounterKindSchema = z.union([z.literal('number'), z.literal('bigint')]);

export type MaskCounterKind = z.infer<typeof maskCounterKindSchema>;

export type Mask = number | bigint;

export const powersetOptionsSchema = z.object({
    counter: maskCounterKindSchema.default('number'),
    maxLength: z.number().int().nonnegative().optional(), // narrows the counter's limit, may raise it for bigint
    copy: z.union([z.literal('reference'), z.literal('clone')]).default('reference'),
    warnAtLength: z.number().int().nonnegative().default(24),
});

export type PowersetSettings = z.infer<typeof powersetOptionsSchema>;

export type PowersetLogger = Pick<Console, 'warn'>;

export type PowersetOptions = z.input<typeof powersetOptionsSchema> & {
    logger?: PowersetLogger;
};

export interface PowersetEntry<T> {
    mask: Mask;
    subset: T[];
}
