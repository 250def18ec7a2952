import type { Position } from '../types/simulation';
import { pick, type RandomSource } from '../utils/random';
import type { MobilityModel } from './MobilityModel';

export interface ManhattanOptions {
  speed?: number;
  grid?: readonly [rows: number, cols: number];
  blockSize?: number;
}

interface GridCell {
  row: number;
  col: number;
}

// Manhattan grid: hop between corners of adjacent blocks, moving along x first and then y,
// so every segment is axis-aligned. The tick that picks the next corner does not move.
export class ManhattanModel implements MobilityModel {
  readonly type = 'manhattan' as const;
  readonly speed: number;
  readonly grid: readonly [number, number];
  readonly blockSize: number;
  private target: Position | null = null;

  constructor(options: ManhattanOptions = {}, private readonly rng: RandomSource = Math.random) {
    this.speed = options.speed ?? 1;
    this.grid = options.grid ?? [10, 10];
    this.blockSize = options.blockSize ?? 10;
  }

  get currentTarget(): Position | null {
    return this.target;
  }

  cellOf(position: Position): GridCell {
    const [rows, cols] = this.grid;
    return {
      row: Math.min(rows - 1, Math.max(0, Math.floor(position.y / this.blockSize))),
      col: Math.min(cols - 1, Math.max(0, Math.floor(position.x / this.blockSize))),
    };
  }

  neighbours(cell: GridCell): GridCell[] {
    const [rows, cols] = this.grid;
    const candidates: GridCell[] = [
      { row: cell.row - 1, col: cell.col },
      { row: cell.row + 1, col: cell.col },
      { row: cell.row, col: cell.col - 1 },
      { row: cell.row, col: cell.col + 1 },
    ];
    return candidates.filter((c) => c.row >= 0 && c.row < rows && c.col >= 0 && c.col < cols);
  }

  nextPosition(current: Position, elapsed: number): Position {
    if (this.target === null) {
      const next = pick(this.rng, this.neighbours(this.cellOf(current)));
      if (next) {
        this.target = { x: next.col * this.blockSize, y: next.row * this.blockSize };
      }
      return current;
    }

    const target = this.target;
    let budget = this.speed * elapsed;
    let { x, y } = current;

    const dx = target.x - x;
    if (Math.abs(dx) <= budget) {
      x = target.x;
      budget -= Math.abs(dx);
    } else {
      x += Math.sign(dx) * budget;
      budget = 0;
    }

    if (x === target.x) {
      const dy = target.y - y;
      y = Math.abs(dy) <= budget ? target.y : y + Math.sign(dy) * budget;
    }

    if (x === target.x && y === target.y) {
      this.target = null;
    }
    return { x, y };
  }
}
