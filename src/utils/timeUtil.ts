export const getIsoTime = (): string => new Date().toISOString();
