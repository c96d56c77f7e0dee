import { createContext, useCallback, useContext, useMemo, useState, type ReactNode, type SyntheticEvent } from 'react';
import Alert, { type AlertColor } from '@mui/material/Alert';
import Snackbar from '@mui/material/Snackbar';
import { NOTIFICATION_DURATION } from '../utils/constants';

interface NotificationOptions {
  message: string;
  severity?: AlertColor;
  duration?: number;
}

interface SnackbarContextType {
  showNotification: (options: NotificationOptions) => void;
}

const SnackbarContext = createContext<SnackbarContextType | undefined>(undefined);

export function useNotification() {
  const context = useContext(SnackbarContext);
  if (!context) {
    throw new Error('useNotification must be used within SnackbarProvider');
  }
  return context;
}

interface Notification extends Required<NotificationOptions> {
  key: number;
}

export function SnackbarProvider({ children }: { children: ReactNode }) {
  const [open, setOpen] = useState(false);
  const [current, setCurrent] = useState<Notification | null>(null);

  // A new message replaces the one on screen and restarts its timer
  const showNotification = useCallback(
    ({ message, severity = 'info', duration = NOTIFICATION_DURATION }: NotificationOptions) => {
      setCurrent({ message, severity, duration, key: Date.now() });
      setOpen(true);
    },
    []
  );

  const handleClose = (_event?: SyntheticEvent | Event, reason?: string) => {
    if (reason === 'clickaway') {
      return;
    }
    setOpen(false);
  };

  const value = useMemo(() => ({ showNotification }), [showNotification]);

  return (
    <SnackbarContext.Provider value={value}>
      {children}
      <Snackbar
        key={current?.key}
        open={open}
        autoHideDuration={current?.duration ?? NOTIFICATION_DURATION}
        onClose={handleClose}
        anchorOrigin={{ vertical: 'bottom', horizontal: 'center' }}
      >
        <Alert onClose={handleClose} severity={current?.severity ?? 'info'} variant="filled" sx={{ width: '100%' }}>
          {current?.message}
        </Alert>
      </Snackbar>
    </SnackbarContext.Provider>
  );
}
