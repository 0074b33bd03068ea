import { Module, Global } from '@nestjs/common';
import { ConfigModule as NestConfigModule, ConfigService } from '@nestjs/config';
import { z } from 'zod';

const serviceAccountSchema = z
    .object({
        client_email: z.string().email(),
        private_key: z.string().min(1),
    })
    .passthrough();

export type ServiceAccountCredentials = z.infer<typeof serviceAccountSchema>;

const serviceAccountJson = z
    .string()
    .min(1)
    .transform((raw, ctx): unknown => {
        try {
            return JSON.parse(raw);
        } catch {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected service account JSON' });
            return z.NEVER;
        }
    })
    .pipe(serviceAccountSchema);

function isTimeZone(zone: string): boolean {
    try {
        new Intl.DateTimeFormat('en-US', { timeZone: zone });
        return true;
    } catch {
        return false;
    }
}

// Zod schema for environment validation
const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),

    // Spreadsheet store
    GOOGLE_SERVICE_ACCOUNT_JSON: serviceAccountJson,
    MEMBERS_SHEET_KEY: z.string().min(1),
    REQUESTS_SHEET_KEY: z.string().min(1),

    // Credentials and sessions
    PIN_SALT: z.string().default(''),
    JWT_SECRET: z.string().min(1),
    JWT_ISSUER: z.string().min(1).default('member-leave-portal'),
    SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(1800),

    PORTAL_TIMEZONE: z.string().default('Australia/Sydney').refine(isTimeZone, 'Expected an IANA time zone'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
    const result = envSchema.safeParse(config);
    if (!result.success) {
        console.error('Invalid environment configuration:');
        console.error(result.error.format());
        throw new Error('Invalid environment configuration');
    }
    return result.data;
}

@Global()
@Module({
    imports: [
        NestConfigModule.forRoot({
            envFilePath: ['.env.local', '.env'],
            validate: validateEnv,
        }),
    ],
    providers: [ConfigService],
    exports: [ConfigService],
})
export class ConfigModule { }
