// Re-export all components
export { GridCell } from "./GridCell";
export { PuzzleGrid } from "./PuzzleGrid";
export { GameActions } from "./GameActions";
export { GameHeader } from "./GameHeader";
export { GameScreen } from "./GameScreen";
export { Instructions } from "./Instructions";
export { MainMenu } from "./MainMenu";
export { ResultOverlay } from "./ResultOverlay";
