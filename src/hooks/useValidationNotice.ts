import { useEffect } from 'react';
import { useAtom } from 'jotai';
import { validationMessageAtom } from '../store/atoms';
import { useNotification } from '../contexts/SnackbarContext';

/**
 * Shows each rejected field edit as a warning snackbar. The message is
 * cleared once shown, so the same rejection twice in a row shows twice.
 */
export function useValidationNotice() {
  const [message, setMessage] = useAtom(validationMessageAtom);
  const { showNotification } = useNotification();

  useEffect(() => {
    if (!message) return;
    showNotification({ message, severity: 'warning' });
    setMessage(null);
  }, [message, showNotification, setMessage]);
}
