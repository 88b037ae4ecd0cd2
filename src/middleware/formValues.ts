import type { Request } from 'express';
import { FILE_NAME_SUFFIX, FILE_SIZE_SUFFIX, FILE_TYPE_SUFFIX } from '../constants/upload';
import type { UploadedFile } from './upload.types';

/**
 * Ordered multi-valued form map rebuilt from the parts of one request.
 *
 * Every uploaded file appends one entry to each of `field`, `field_name`,
 * `field_type` and `field_size`, so position `i` of the four lists always
 * describes the same file, in the order the files were sent.
 */
export class FormValues {
  private readonly values = new Map<string, string[]>();

  addField(name: string, value: string) {
    this.append(name, value);
  }

  addFile(field: string, file: UploadedFile) {
    this.append(field, file.key);
    this.append(`${field}${FILE_NAME_SUFFIX}`, file.name);
    this.append(`${field}${FILE_TYPE_SUFFIX}`, file.type);
    this.append(`${field}${FILE_SIZE_SUFFIX}`, String(file.size));
  }

  get(name: string): string | undefined {
    return this.values.get(name)?.[0];
  }

  getAll(name: string): string[] {
    return [...(this.values.get(name) ?? [])];
  }

  entries(): [string, string[]][] {
    return [...this.values].map(([key, list]) => [key, [...list]]);
  }

  toObject(): Record<string, string[]> {
    return Object.fromEntries(this.entries());
  }

  private append(key: string, value: string) {
    const list = this.values.get(key);
    if (list) list.push(value);
    else this.values.set(key, [value]);
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asList = (value: unknown): unknown[] => {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
};

// Appends to whatever body an earlier parser left on the request; a scalar
// already there becomes the first element of its list.
export const mergeFormValues = (req: Request, form: FormValues) => {
  const body: Record<string, unknown> = isRecord(req.body) ? req.body : {};
  for (const [key, list] of form.entries()) {
    body[key] = [...asList(body[key]), ...list];
  }
  req.body = body;
};
