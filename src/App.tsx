import { GameScreen, MainMenu } from "./components";
import { useCurrentScreen, useStartGame } from "./store/puzzleStore";

function App() {
  const currentScreen = useCurrentScreen();
  const startGame = useStartGame();

  const handlePlay = () => {
    startGame();
  };

  switch (currentScreen) {
    case "menu":
      return <MainMenu onPlay={handlePlay} />;

    case "playing":
      return <GameScreen />;

    default:
      return <MainMenu onPlay={handlePlay} />;
  }
}

export default App;
