/**
 * Turns ASCII map text into a passability grid and the
 * row-major list of free cells.
 */

import { Result, ok, err } from 'neverthrow';
import { Cell, CellState, GridIndex, MapHeader } from '../../../shared/types/GridTypes';
import { MAP_HEADER_LINES } from '../../config/waypointConfig';
import { MalformedMapError } from './errors';

const DEFAULT_PASSABLE_CHARS = '.';

function splitLines(text: string): string[] {
  const lines = text.split('\n').map((line) => line.replace(/\r$/, ''));
  // Trailing blank lines carry no rows
  while (lines.length > 0 && lines[lines.length - 1].trim() === '') {
    lines.pop();
  }
  return lines;
}

function parseDimension(line: string, name: 'height' | 'width'): number | null {
  const [label, value, ...rest] = line.trim().split(/\s+/);
  if (label?.toLowerCase() !== name || rest.length > 0 || !/^\d+$/.test(value ?? '')) {
    return null;
  }
  const parsed = Number(value);
  return parsed > 0 ? parsed : null;
}

function parseHeader(lines: string[]): Result<MapHeader, MalformedMapError> {
  if (lines.length < MAP_HEADER_LINES) {
    return err(new MalformedMapError(`Map has ${lines.length} lines, header needs ${MAP_HEADER_LINES}`));
  }

  const [typeLine, heightLine, widthLine, mapLine] = lines;
  const [typeLabel, ...typeRest] = typeLine.trim().split(/\s+/);
  if (typeLabel.toLowerCase() !== 'type') {
    return err(new MalformedMapError(`Expected "type" header, got "${typeLine}"`));
  }

  const height = parseDimension(heightLine, 'height');
  if (height === null) {
    return err(new MalformedMapError(`Invalid height header "${heightLine}"`));
  }

  const width = parseDimension(widthLine, 'width');
  if (width === null) {
    return err(new MalformedMapError(`Invalid width header "${widthLine}"`));
  }

  if (mapLine.trim().toLowerCase() !== 'map') {
    return err(new MalformedMapError(`Expected "map" header, got "${mapLine}"`));
  }

  return ok({ type: typeRest.join(' '), height, width });
}

/**
 * Parse a map file's text.
 *
 * The grid must have exactly `height` rows of exactly `width` characters;
 * any disagreement with the header fails the whole map.
 *
 * @param text Raw map file contents
 * @param passableChars Characters treated as Free; everything else is Blocked
 */
export function parseMap(
  text: string,
  passableChars: string = DEFAULT_PASSABLE_CHARS
): Result<GridIndex, MalformedMapError> {
  const lines = splitLines(text);

  return parseHeader(lines).andThen((header): Result<GridIndex, MalformedMapError> => {
    const rows = lines.slice(MAP_HEADER_LINES);
    if (rows.length !== header.height) {
      return err(
        new MalformedMapError(`Map declares height ${header.height} but has ${rows.length} rows`)
      );
    }

    const passable = new Set(passableChars);
    const cells: CellState[][] = [];
    const freeCells: Cell[] = [];

    for (let y = 0; y < rows.length; y++) {
      const row = rows[y];
      if (row.length !== header.width) {
        return err(
          new MalformedMapError(`Row ${y} has ${row.length} columns, header declares width ${header.width}`)
        );
      }

      const states: CellState[] = [];
      for (let x = 0; x < row.length; x++) {
        if (passable.has(row[x])) {
          states.push(CellState.FREE);
          freeCells.push({ x, y });
        } else {
          states.push(CellState.BLOCKED);
        }
      }
      cells.push(states);
    }

    return ok({
      header,
      grid: { width: header.width, height: header.height, cells },
      freeCells,
    });
  });
}
