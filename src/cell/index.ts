export { Cell, CellSet, compareCells } from "./cell";
