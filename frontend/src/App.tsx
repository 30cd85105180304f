// frontend/src/App.tsx
import AppRoutes from './AppRoutes';

function App() {
  return <AppRoutes />;
}

export default App;
