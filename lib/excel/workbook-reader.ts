/**
 * Workbook Reader: embedded images with their cell anchors
 *
 * Reads the XLSX package (a ZIP of XML parts) directly, because SheetJS
 * skips drawings and media. For every sheet the relationship chain is:
 *
 *   workbook.xml  <sheet r:id>     → workbook.xml.rels → worksheets/sheetN.xml
 *   sheetN.xml.rels  (drawing)     → drawings/drawingM.xml
 *   drawingM.xml  <xdr:from col,row> + <a:blip r:embed>
 *   drawingM.xml.rels  rId         → media/imageK.png
 *
 * Images come out in sheet order, then in anchor order inside each drawing.
 * A picture placed in two cells yields two anchored images.
 */

import * as path from 'path';
import JSZip from 'jszip';
import { UnsupportedFormatError, errorMessage } from '../errors';
import { createLogger } from '../logger';
import type { AnchoredImage, WorkbookInput } from '../types';
import { columnIndexToLetter } from './column-mapper';

const log = createLogger('WorkbookReader');

const DRAWING_REL_TYPE = /\/relationships\/drawing$/i;
const OFFICE_DOCUMENT_REL_TYPE = /\/relationships\/officeDocument$/i;

// ============================================================================
// Types
// ============================================================================

export interface SheetPart {
  /** Sheet name as shown on the tab */
  name: string;
  /** 0-based position in the workbook */
  index: number;
  /** Worksheet part path (e.g., "xl/worksheets/sheet1.xml") */
  path: string;
}

export interface WorkbookPackage {
  fileName: string;
  sheets: SheetPart[];
  /** Non-fatal problems met while resolving drawings */
  warnings: string[];
  /**
   * Walk every image anchor in the workbook.
   * Each call starts a fresh walk over the opened package.
   */
  images(): AsyncGenerator<AnchoredImage>;
}

interface Relationship {
  id: string;
  type: string;
  target: string;
  external: boolean;
}

interface DrawingAnchor {
  rId: string;
  /** 0-based column */
  col: number;
  /** 0-based row */
  row: number;
}

// ============================================================================
// XML Helpers
// ============================================================================

const XML_ENTITIES: Record<string, string> = {
  '&amp;': '&', '&lt;': '<', '&gt;': '>', '&apos;': "'", '&quot;': '"',
};

function decodeXmlEntities(text: string): string {
  if (!text.includes('&')) return text;
  return text
    .replace(/&#(\d+);/g, (_m, code: string) => String.fromCodePoint(parseInt(code, 10)))
    .replace(/&#x([0-9a-f]+);/gi, (_m, code: string) => String.fromCodePoint(parseInt(code, 16)))
    .replace(/&(?:amp|lt|gt|apos|quot);/g, (m) => XML_ENTITIES[m] || m);
}

/** Extract an attribute value from the attribute text of one tag */
function extractAttr(attrs: string, attrName: string): string | undefined {
  const escaped = attrName.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  const match = attrs.match(new RegExp(`(?:^|\\s)${escaped}\\s*=\\s*"([^"]*)"`));
  return match ? decodeXmlEntities(match[1]) : undefined;
}

function parseRelationships(xml: string): Relationship[] {
  const rels: Relationship[] = [];
  const relRegex = /<(?:\w+:)?Relationship\b([^>]*?)\/?>/g;
  let match;
  while ((match = relRegex.exec(xml)) !== null) {
    const attrs = match[1];
    const id = extractAttr(attrs, 'Id');
    const target = extractAttr(attrs, 'Target');
    if (!id || !target) continue;
    rels.push({
      id,
      type: extractAttr(attrs, 'Type') ?? '',
      target,
      external: extractAttr(attrs, 'TargetMode') === 'External',
    });
  }
  return rels;
}

/** Resolve a relationship target against the directory of its source part */
function resolveTarget(sourcePart: string, target: string): string {
  if (target.startsWith('/')) return target.slice(1);
  return path.posix.normalize(path.posix.join(path.posix.dirname(sourcePart), target));
}

/** Relationships part of a package part: xl/a/b.xml → xl/a/_rels/b.xml.rels */
function relsPathFor(partPath: string): string {
  return path.posix.join(path.posix.dirname(partPath), '_rels', `${path.posix.basename(partPath)}.rels`);
}

/**
 * Parse drawing XML for picture anchors.
 *
 * Drawings position pictures with <xdr:twoCellAnchor> or <xdr:oneCellAnchor>:
 * <xdr:from><xdr:col>2</xdr:col><xdr:row>1</xdr:row></xdr:from> holds the
 * top-left cell, <a:blip r:embed="rId1"/> points at the media part.
 * Absolute anchors have no cell and are skipped.
 */
function parseDrawingAnchors(drawingXml: string): DrawingAnchor[] {
  const anchors: DrawingAnchor[] = [];
  const anchorRegex = /<((?:\w+:)?(?:twoCellAnchor|oneCellAnchor))\b[^>]*>([\s\S]*?)<\/\1>/g;
  let anchorMatch;

  while ((anchorMatch = anchorRegex.exec(drawingXml)) !== null) {
    const anchorXml = anchorMatch[2];

    const fromMatch = anchorXml.match(/<(?:\w+:)?from>([\s\S]*?)<\/(?:\w+:)?from>/);
    if (!fromMatch) continue;

    const colMatch = fromMatch[1].match(/<(?:\w+:)?col>\s*(\d+)\s*<\/(?:\w+:)?col>/);
    const rowMatch = fromMatch[1].match(/<(?:\w+:)?row>\s*(\d+)\s*<\/(?:\w+:)?row>/);
    if (!colMatch || !rowMatch) continue;

    // Only pictures; shapes and charts carry no blip
    const blipMatch = anchorXml.match(/<(?:\w+:)?blip\b[^>]*?\s(?:\w+:)?embed\s*=\s*"([^"]*)"/);
    if (!blipMatch) continue;

    anchors.push({
      rId: blipMatch[1],
      col: parseInt(colMatch[1], 10),
      row: parseInt(rowMatch[1], 10),
    });
  }

  return anchors;
}

// ============================================================================
// Package Access
// ============================================================================

function corruptPart(fileName: string, partPath: string, err: unknown): UnsupportedFormatError {
  return new UnsupportedFormatError(
    `${fileName} is corrupted: part ${partPath} cannot be read (${errorMessage(err)})`,
    { fileName, cause: err instanceof Error ? err : undefined }
  );
}

async function readText(zip: JSZip, partPath: string, fileName: string): Promise<string | null> {
  const file = zip.file(partPath);
  if (!file) return null;
  try {
    return await file.async('string');
  } catch (err) {
    throw corruptPart(fileName, partPath, err);
  }
}

async function readBytes(file: JSZip.JSZipObject, fileName: string): Promise<Buffer> {
  try {
    return await file.async('nodebuffer');
  } catch (err) {
    throw corruptPart(fileName, file.name, err);
  }
}

async function findWorkbookPart(zip: JSZip, fileName: string): Promise<string> {
  const rootRels = await readText(zip, '_rels/.rels', fileName);
  if (rootRels) {
    const officeDoc = parseRelationships(rootRels).find(r => OFFICE_DOCUMENT_REL_TYPE.test(r.type));
    if (officeDoc) return resolveTarget('', officeDoc.target);
  }
  return 'xl/workbook.xml';
}

async function listSheets(zip: JSZip, workbookPath: string, fileName: string): Promise<SheetPart[]> {
  const workbookXml = await readText(zip, workbookPath, fileName);
  if (workbookXml === null) {
    throw new UnsupportedFormatError(
      `${fileName} is not an Excel .xlsx workbook (no workbook part found)`,
      { fileName }
    );
  }

  const relsXml = await readText(zip, relsPathFor(workbookPath), fileName);
  const rels = new Map((relsXml ? parseRelationships(relsXml) : []).map(r => [r.id, r]));

  const sheets: SheetPart[] = [];
  const sheetRegex = /<(?:\w+:)?sheet\b([^>]*?)\/?>/g;
  let match;
  let position = 0;
  while ((match = sheetRegex.exec(workbookXml)) !== null) {
    const attrs = match[1];
    const name = extractAttr(attrs, 'name');
    const rId = extractAttr(attrs, 'r:id');
    const index = position++;
    if (!name || !rId) continue;

    const rel = rels.get(rId);
    if (!rel || rel.external) continue;

    sheets.push({ name, index, path: resolveTarget(workbookPath, rel.target) });
  }

  return sheets;
}

// ============================================================================
// Main Entry Point
// ============================================================================

/**
 * Open an uploaded workbook.
 *
 * @throws UnsupportedFormatError when the bytes are not a ZIP-based .xlsx package
 *   or any entry fails its CRC check
 *
 * @example
 * ```typescript
 * const workbook = await openWorkbook({ fileName: 'parts.xlsx', data });
 * for await (const image of workbook.images()) {
 *   console.log(image.sheetName, `${image.anchorColumn}${image.anchorRow}`, image.bytes.length);
 * }
 * ```
 */
export async function openWorkbook(input: WorkbookInput): Promise<WorkbookPackage> {
  const { fileName, data } = input;

  let zip: JSZip;
  try {
    // Inflates and checks every entry up front; SheetJS loops on corrupt deflate data
    zip = await JSZip.loadAsync(data, { checkCRC32: true });
  } catch (err) {
    throw new UnsupportedFormatError(
      `${fileName} is not a valid .xlsx workbook or is corrupted (${errorMessage(err)})`,
      { fileName, cause: err instanceof Error ? err : undefined }
    );
  }

  const workbookPath = await findWorkbookPart(zip, fileName);
  const sheets = await listSheets(zip, workbookPath, fileName);
  const warnings: string[] = [];

  const warn = (message: string) => {
    warnings.push(message);
    log.warn(`${fileName}: ${message}`);
  };

  async function* sheetImages(sheet: SheetPart, media: Map<string, Buffer>): AsyncGenerator<AnchoredImage> {
    const sheetRelsXml = await readText(zip, relsPathFor(sheet.path), fileName);
    if (!sheetRelsXml) return;

    const drawingRels = parseRelationships(sheetRelsXml)
      .filter(r => DRAWING_REL_TYPE.test(r.type) && !r.external);

    for (const drawingRel of drawingRels) {
      const drawingPath = resolveTarget(sheet.path, drawingRel.target);
      const drawingXml = await readText(zip, drawingPath, fileName);
      if (drawingXml === null) {
        warn(`drawing ${drawingPath} of sheet "${sheet.name}" is missing`);
        continue;
      }

      const relsXml = await readText(zip, relsPathFor(drawingPath), fileName);
      const mediaRels = new Map((relsXml ? parseRelationships(relsXml) : []).map(r => [r.id, r]));

      for (const anchor of parseDrawingAnchors(drawingXml)) {
        const rel = mediaRels.get(anchor.rId);
        if (!rel || rel.external) {
          // Linked (not embedded) pictures have no bytes in the package
          continue;
        }

        const mediaPath = resolveTarget(drawingPath, rel.target);
        let bytes = media.get(mediaPath);
        if (!bytes) {
          const file = zip.file(mediaPath);
          if (!file) {
            warn(`image ${mediaPath} referenced by sheet "${sheet.name}" is missing`);
            continue;
          }
          bytes = await readBytes(file, fileName);
          media.set(mediaPath, bytes);
        }

        yield {
          bytes,
          sheetName: sheet.name,
          anchorRow: anchor.row + 1,
          anchorColumn: columnIndexToLetter(anchor.col),
          mediaPath,
        };
      }
    }
  }

  return {
    fileName,
    sheets,
    warnings,
    async *images(): AsyncGenerator<AnchoredImage> {
      // Media bytes shared between anchors of this walk only
      const media = new Map<string, Buffer>();
      for (const sheet of sheets) {
        yield* sheetImages(sheet, media);
      }
    },
  };
}

/** Collect every anchored image of a workbook in order */
export async function readAnchoredImages(input: WorkbookInput): Promise<AnchoredImage[]> {
  const workbook = await openWorkbook(input);
  const images: AnchoredImage[] = [];
  for await (const image of workbook.images()) {
    images.push(image);
  }
  return images;
}
