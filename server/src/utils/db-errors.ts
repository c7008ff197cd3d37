const UNIQUE_VIOLATION = "23505";

const readString = (value: object, key: string) => {
  const field: unknown = Reflect.get(value, key);
  return typeof field === "string" ? field : undefined;
};

/**
 * True when `error` (or something in its `cause` chain) is a PostgreSQL
 * unique violation, optionally limited to one named constraint.
 */
export const isUniqueViolation = (error: unknown, constraint?: string): boolean => {
  let current: unknown = error;

  for (let depth = 0; depth < 5; depth += 1) {
    if (typeof current !== "object" || current === null) {
      return false;
    }

    if (readString(current, "code") === UNIQUE_VIOLATION) {
      if (!constraint) {
        return true;
      }

      const reported = readString(current, "constraint");
      const message = readString(current, "message") ?? "";
      return reported === constraint || message.includes(`"${constraint}"`);
    }

    current = Reflect.get(current, "cause");
  }

  return false;
};
