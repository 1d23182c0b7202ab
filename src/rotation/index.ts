export { rotate, type RotationResult } from "./rotation";
