// Input checks shared by the command layer (cli.ts), the interactive menu
// (menu.ts) and the task store.

export const MAX_TITLE_LENGTH = 1000;
export const MAX_DESCRIPTION_LENGTH = 10000;
export const MAX_CATEGORY_LENGTH = 200;

export function sanitizeTitle(title: string): string {
  return title.replace(/[\r\n]+/g, " ").trim();
}

export type ValidationResult = { valid: true } | { valid: false; message: string };

export function validateTitle(title: string): ValidationResult {
  if (title.length === 0) {
    return { valid: false, message: "Title cannot be empty." };
  }
  if (title.length > MAX_TITLE_LENGTH) {
    return {
      valid: false,
      message: `Title exceeds maximum length of ${MAX_TITLE_LENGTH} characters.`,
    };
  }
  return { valid: true };
}

export function validateDescription(description: string): ValidationResult {
  if (description.length > MAX_DESCRIPTION_LENGTH) {
    return {
      valid: false,
      message: `Description exceeds maximum length of ${MAX_DESCRIPTION_LENGTH} characters.`,
    };
  }
  return { valid: true };
}

export function validateCategory(category: string): ValidationResult {
  if (category.length === 0) {
    return { valid: false, message: "Category cannot be empty." };
  }
  if (category.length > MAX_CATEGORY_LENGTH) {
    return {
      valid: false,
      message: `Category exceeds maximum length of ${MAX_CATEGORY_LENGTH} characters.`,
    };
  }
  return { valid: true };
}

export type ParsedId = { valid: true; id: number } | { valid: false; message: string };

export function parseId(raw: string): ParsedId {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    return { valid: false, message: `Invalid task ID: '${raw}'. Expected a positive integer.` };
  }
  const id = Number(trimmed);
  if (id < 1 || !Number.isSafeInteger(id)) {
    return { valid: false, message: `Invalid task ID: '${raw}'. Expected a positive integer.` };
  }
  return { valid: true, id };
}
