export enum CellState {
    FREE = 'FREE',
    BLOCKED = 'BLOCKED'
}

/** Grid coordinate: x is the column, y is the row. */
export interface Cell {
    x: number;
    y: number;
}

export interface MapHeader {
    type: string;
    height: number;
    width: number;
}

export interface Grid {
    readonly width: number;
    readonly height: number;
    // Row-major: cells[y][x]
    readonly cells: ReadonlyArray<ReadonlyArray<CellState>>;
}

export interface GridIndex {
    header: MapHeader;
    grid: Grid;
    // Row-major scan order
    freeCells: ReadonlyArray<Cell>;
}
