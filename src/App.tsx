import { GameProvider, useGame } from './ui/context/GameContext';
import { SetupScreen } from './ui/components/Setup/SetupScreen';
import { Game } from './ui/components/Game';
import { ErrorBoundary } from './ui/components/ErrorBoundary';

function Screens() {
  const { state, error, startGame, exitToMenu } = useGame();

  if (state === null) {
    return <SetupScreen onStart={startGame} error={error} />;
  }

  return (
    <ErrorBoundary onReset={exitToMenu}>
      <Game state={state} />
    </ErrorBoundary>
  );
}

function App() {
  return (
    <GameProvider>
      <Screens />
    </GameProvider>
  );
}

export default App;
