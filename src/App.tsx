import Box from '@mui/material/Box';
import Typography from '@mui/material/Typography';
import { useCallback } from 'react';
import { useSetAtom } from 'jotai';
import { Route, Switch, useLocation } from 'wouter';
import { AppBar } from './components/Layout/AppBar';
import { ErrorBoundary } from './components/Common/ErrorBoundary';
import { DataLayer } from './components/System/DataLayer';
import { SensorSetup } from './components/Setup/SensorSetup';
import { DataView } from './components/Data/DataView';
import { Providers } from './components/System/Providers';
import { endSessionAtom } from './store/session';

function AppContent() {
  const [, navigate] = useLocation();
  const endSession = useSetAtom(endSessionAtom);

  // A screen that failed to render starts over from sensor setup
  const handleReset = useCallback(() => {
    endSession();
    navigate('/');
  }, [endSession, navigate]);

  return (
    <Box sx={{ display: 'flex', minHeight: '100vh' }}>
      <AppBar />
      <Box component="main" sx={{ flexGrow: 1, mt: 8, p: 3 }}>
        <ErrorBoundary onReset={handleReset}>
          <Switch>
            <Route path="/" component={SensorSetup} />
            <Route path="/data" component={DataView} />
            <Route>
              <Typography variant="h5" gutterBottom>
                404 - Not Found
              </Typography>
              <Typography variant="body1" color="text.secondary">
                The page you're looking for doesn't exist.
              </Typography>
            </Route>
          </Switch>
        </ErrorBoundary>
      </Box>
    </Box>
  );
}

function App() {
  return (
    <ErrorBoundary>
      <Providers>
        {/* One bridge connection for the whole app */}
        <DataLayer />
        <AppContent />
      </Providers>
    </ErrorBoundary>
  );
}

export default App;
