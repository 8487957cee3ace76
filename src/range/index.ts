export { RangeConstraint } from "./range-constraint";
