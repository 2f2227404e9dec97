import { InvalidFileNameError } from '../errors/export.errors';

/**
 * Export File Name Value Object
 * A storage key that can never address anything outside the export root
 */
export class ExportFileNameVO {
  private static readonly MAX_LENGTH = 255;
  private static readonly FORBIDDEN_CHARACTERS = /[/\\\0]/;

  private constructor(private readonly _value: string) {}

  static create(value: string): ExportFileNameVO {
    ExportFileNameVO.validate(value);
    return new ExportFileNameVO(value);
  }

  /**
   * Name for the output of one job: `<type title>_<jobId>.<extension>`
   */
  static forJob(typeTitle: string, jobId: string, extension: string): ExportFileNameVO {
    const slug = typeTitle.toLowerCase().replace(/[^a-z0-9-]+/g, '-').replace(/^-+|-+$/g, '');
    const ext = extension.replace(/^\.+/, '').toLowerCase();
    return ExportFileNameVO.create(`${slug || 'export'}_${jobId}.${ext}`);
  }

  private static validate(value: string): void {
    if (!value || value.trim().length === 0) {
      throw new InvalidFileNameError(value, 'name is empty');
    }
    if (value.length > ExportFileNameVO.MAX_LENGTH) {
      throw new InvalidFileNameError(value, 'name is too long');
    }
    if (ExportFileNameVO.FORBIDDEN_CHARACTERS.test(value)) {
      throw new InvalidFileNameError(value, 'name contains a path separator');
    }
    if (value.includes('..')) {
      throw new InvalidFileNameError(value, 'name contains ".."');
    }
    if (value.startsWith('.')) {
      throw new InvalidFileNameError(value, 'name starts with "."');
    }
  }

  get value(): string {
    return this._value;
  }

  get extension(): string {
    const dot = this._value.lastIndexOf('.');
    return dot > 0 ? this._value.substring(dot + 1).toLowerCase() : '';
  }

  equals(other: ExportFileNameVO): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this._value;
  }
}
