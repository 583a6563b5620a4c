import { Board } from './board/Board';
import { NoSolutionError } from './errors';
import { PuzzleConstraintAdapter } from './puzzle';
import { compareCellKeys } from './shapes';

// Usage: tsx src/main.ts [--hint]
const board = Board.createDefault();
const adapter = new PuzzleConstraintAdapter(board, { debug: true });
const hintOnly = process.argv.includes('--hint');

console.log(`Board ${board.rows}x${board.cols}: ${board.releasedEmptyCells.size} empty cells, ` +
  `${board.releasedUnplacedShapes.length} shapes to place`);

try {
  if (hintOnly) {
    const shape = adapter.help();
    console.log(`Hint: move ${shape.name}`);
  } else {
    adapter.solve();
  }
} catch (err) {
  if (!(err instanceof NoSolutionError)) throw err;
  console.log(err.message);
  process.exitCode = 1;
}

for (const shape of board.shapes) {
  console.log(`  ${shape.name.padEnd(8)} ${[...shape.cells].sort(compareCellKeys).join(' ')}`);
}

console.log(board.isWon() ? 'Board solved!' : `${board.releasedEmptyCells.size} cells left to cover`);
