import { constants as fsConstants, type Stats } from "fs";
import fs from "fs/promises";
import JSZip from "jszip";
import path from "path";
import { DEFAULT_PROCESSING_CONFIG, type ExcelParseConfig } from "../../config/excelConfig";
import { ErrorCodes, toErrorMessage } from "../../utils/errors";
import { ValidationResult, failed, passed } from "../models";
import type { WorkbookHandle } from "../types";

const BYTES_PER_MB = 1024 * 1024;

export const OLE2_MAGIC_BYTES = [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1] as const;
export const XLSX_REQUIRED_ENTRIES = ["xl/workbook.xml", "xl/worksheets/"] as const;

export const MAX_WORKSHEET_NAME_LENGTH = 31;
const ILLEGAL_WORKSHEET_NAME_CHARS = /[[\]:*?/\\]/;

export function isValidWorksheetName(name: string): boolean {
  return name.trim().length > 0 && name.length <= MAX_WORKSHEET_NAME_LENGTH && !ILLEGAL_WORKSHEET_NAME_CHARS.test(name);
}

/** File-level and workbook-level checks. Each check returns one result and never throws. */
export class ExcelFileValidator {
  constructor(private readonly config: ExcelParseConfig = DEFAULT_PROCESSING_CONFIG.parse) {}

  async validateFilePath(filePath: string): Promise<ValidationResult> {
    const fail = (message: string, code: string) => failed("file_path", message, filePath, "ERROR", { code });

    let stat: Stats;
    try {
      stat = await fs.stat(filePath);
    } catch {
      return fail(`File does not exist: ${filePath}`, ErrorCodes.FILE_NOT_FOUND);
    }
    if (!stat.isFile()) {
      return fail(`Path is not a file: ${filePath}`, ErrorCodes.FILE_NOT_FOUND);
    }
    try {
      await fs.access(filePath, fsConstants.R_OK);
    } catch {
      return fail(`File is not readable: ${filePath}`, ErrorCodes.FILE_ACCESS_DENIED);
    }
    return passed("file_path", `File path is valid and accessible: ${filePath}`, filePath);
  }

  async validateFileFormat(filePath: string): Promise<ValidationResult> {
    const extension = path.extname(filePath).toLowerCase();
    if (!this.config.allowedExtensions.includes(extension)) {
      return failed(
        "file_format",
        `File extension '${extension}' not supported. Allowed: ${this.config.allowedExtensions.join(", ")}`,
        filePath,
        "ERROR",
        { code: ErrorCodes.FILE_FORMAT_INVALID, file_extension: extension, allowed_extensions: [...this.config.allowedExtensions] }
      );
    }

    try {
      if (extension === ".xlsx") {
        const problem = await this.checkXlsxContainer(filePath);
        if (problem) return problem;
      } else if (extension === ".xls") {
        const problem = await this.checkOleHeader(filePath);
        if (problem) return problem;
      }
    } catch (error) {
      return failed("file_format", `File format validation error: ${toErrorMessage(error)}`, filePath, "ERROR", {
        code: ErrorCodes.FILE_FORMAT_INVALID,
        exception: toErrorMessage(error),
      });
    }

    return passed("file_format", `File format is valid: ${extension}`, filePath, { file_extension: extension });
  }

  private async checkXlsxContainer(filePath: string): Promise<ValidationResult | undefined> {
    const buffer = await fs.readFile(filePath);
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(buffer);
    } catch {
      return failed("file_format", "File is not a valid ZIP archive (corrupted Excel file)", filePath, "ERROR", {
        code: ErrorCodes.FILE_CORRUPTED,
      });
    }
    const names = Object.keys(zip.files);
    for (const required of XLSX_REQUIRED_ENTRIES) {
      const present = required.endsWith("/")
        ? names.some(name => name.startsWith(required) && name.length > required.length)
        : names.includes(required);
      if (!present) {
        return failed("file_format", `File does not appear to be a valid Excel file: missing ${required}`, filePath, "ERROR", {
          code: ErrorCodes.FILE_CORRUPTED,
          missing_structure: required,
        });
      }
    }
    return undefined;
  }

  private async checkOleHeader(filePath: string): Promise<ValidationResult | undefined> {
    const handle = await fs.open(filePath, "r");
    try {
      const header = Buffer.alloc(OLE2_MAGIC_BYTES.length);
      const { bytesRead } = await handle.read(header, 0, header.length, 0);
      const matches = bytesRead === header.length && OLE2_MAGIC_BYTES.every((byte, i) => header[i] === byte);
      if (!matches) {
        return failed("file_format", "File does not appear to be a valid Excel .xls file (invalid header)", filePath, "ERROR", {
          code: ErrorCodes.FILE_CORRUPTED,
        });
      }
      return undefined;
    } finally {
      await handle.close();
    }
  }

  async validateFileSize(filePath: string, maxSizeMb: number = this.config.maxFileSizeMb): Promise<ValidationResult> {
    let fileSizeBytes: number;
    try {
      fileSizeBytes = (await fs.stat(filePath)).size;
    } catch (error) {
      return failed("file_size", `File size validation error: ${toErrorMessage(error)}`, filePath, "ERROR", {
        code: ErrorCodes.FILE_NOT_FOUND,
        exception: toErrorMessage(error),
      });
    }

    const fileSizeMb = fileSizeBytes / BYTES_PER_MB;
    const context = { file_size_mb: fileSizeMb, max_size_mb: maxSizeMb, file_size_bytes: fileSizeBytes };
    if (fileSizeMb > maxSizeMb) {
      return failed(
        "file_size",
        `File size ${fileSizeMb.toFixed(2)}MB exceeds maximum allowed ${maxSizeMb}MB`,
        filePath,
        "ERROR",
        { code: ErrorCodes.FILE_TOO_LARGE, ...context }
      );
    }
    return passed("file_size", `File size ${fileSizeMb.toFixed(2)}MB is within limits`, filePath, context);
  }

  /** Path, size and format checks, honouring `validateFileExists` and `validateFileFormat`. */
  async validateFile(filePath: string): Promise<ValidationResult[]> {
    const results: ValidationResult[] = [];

    if (this.config.validateFileExists) {
      results.push(await this.validateFilePath(filePath));
    }

    results.push(await this.validateFileSize(filePath));

    if (this.config.validateFileFormat) {
      results.push(await this.validateFileFormat(filePath));
    }

    return results;
  }

  validateWorkbookStructure(workbook: WorkbookHandle): ValidationResult {
    const names = workbook.sheetNames();

    if (names.length === 0) {
      return failed("workbook_structure", "Workbook contains no worksheets", "workbook");
    }
    if (names.length > this.config.maxTabs) {
      return failed(
        "workbook_structure",
        `Workbook has ${names.length} worksheets, exceeds limit of ${this.config.maxTabs}`,
        "workbook",
        "ERROR",
        { worksheet_count: names.length, max_tabs: this.config.maxTabs }
      );
    }

    const invalidNames = names.filter(name => !isValidWorksheetName(name));
    if (invalidNames.length > 0) {
      return failed(
        "workbook_structure",
        `Workbook contains invalid worksheet names: ${invalidNames.join(", ")}`,
        "workbook",
        "ERROR",
        { invalid_names: invalidNames }
      );
    }

    return passed("workbook_structure", `Workbook structure is valid with ${names.length} worksheets`, "workbook", {
      worksheet_count: names.length,
      worksheet_names: names,
    });
  }

  validateRequiredTabs(workbook: WorkbookHandle, requiredTabs: readonly string[] = []): ValidationResult {
    if (requiredTabs.length === 0) {
      return passed("required_tabs", "No required tabs specified", "workbook");
    }
    const actualTabs = workbook.sheetNames();
    const missingTabs = requiredTabs.filter(tab => !actualTabs.includes(tab));
    if (missingTabs.length > 0) {
      return failed("required_tabs", `Required tabs missing: ${missingTabs.join(", ")}`, "workbook", "ERROR", {
        required_tabs: [...requiredTabs],
        actual_tabs: actualTabs,
        missing_tabs: missingTabs,
      });
    }
    return passed("required_tabs", `All required tabs are present: ${requiredTabs.join(", ")}`, "workbook", {
      required_tabs: [...requiredTabs],
      actual_tabs: actualTabs,
    });
  }
}
