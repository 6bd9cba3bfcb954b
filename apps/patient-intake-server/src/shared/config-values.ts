export const parseNumber = (value?: string): number | undefined => {
  if (!value) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};

export const parseBoolean = (value?: string): boolean | undefined => {
  if (!value) {
    return undefined;
  }
  return value.trim().toLowerCase() === 'true';
};

export const getRequired = (value: string | undefined, key: string): string => {
  if (!value) {
    throw new Error(`${key} is not set`);
  }
  return value;
};
