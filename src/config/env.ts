const parseOptionalInt = (value?: string): number | undefined => {
    if (!value) return undefined;
    const parsed = parseInt(value);
    return Number.isNaN(parsed) ? undefined : parsed;
};

export const config = {
    logLevel: process.env.LOG_LEVEL || 'info',
    logFile: process.env.LOG_FILE || '',
    demoSeed: parseOptionalInt(process.env.DEMO_SEED),
    demoRange: parseFloat(process.env.DEMO_RANGE || '10'),
    pushRange: parseFloat(process.env.PUSH_RANGE || '5'),
};
