import { Component, type ErrorInfo, type ReactNode } from 'react';
import Alert from '@mui/material/Alert';
import Box from '@mui/material/Box';
import Button from '@mui/material/Button';
import Paper from '@mui/material/Paper';
import Typography from '@mui/material/Typography';
import ErrorIcon from '@mui/icons-material/ErrorOutline';
import RefreshIcon from '@mui/icons-material/Refresh';
import { logger } from '../../utils/logger';

interface ErrorBoundaryProps {
  children: ReactNode;
  /** Called by "Try Again" before the subtree is re-mounted */
  onReset?: () => void;
}

interface ErrorBoundaryState {
  error: Error | null;
  componentStack: string | null;
}

/**
 * Catches render errors (a chart that throws on bad data, say) and shows a
 * fallback instead of a blank page.
 */
export class ErrorBoundary extends Component<ErrorBoundaryProps, ErrorBoundaryState> {
  state: ErrorBoundaryState = { error: null, componentStack: null };

  static getDerivedStateFromError(error: Error): Partial<ErrorBoundaryState> {
    return { error };
  }

  componentDidCatch(error: Error, errorInfo: ErrorInfo): void {
    logger.error('[ErrorBoundary] Render failed:', error);
    this.setState({ componentStack: errorInfo.componentStack ?? null });
  }

  handleReload = (): void => {
    window.location.reload();
  };

  handleReset = (): void => {
    this.props.onReset?.();
    this.setState({ error: null, componentStack: null });
  };

  render() {
    const { error, componentStack } = this.state;
    if (!error) {
      return this.props.children;
    }

    return (
      <Box display="flex" justifyContent="center" alignItems="center" minHeight="60vh" p={3}>
        <Paper elevation={3} sx={{ maxWidth: 600, p: 4, textAlign: 'center' }}>
          <ErrorIcon sx={{ fontSize: 64, color: 'error.main', mb: 2 }} />
          <Typography variant="h5" gutterBottom color="error">
            Something went wrong
          </Typography>

          <Alert severity="error" sx={{ textAlign: 'left', mb: 3 }}>
            <Typography variant="caption" component="pre" sx={{ whiteSpace: 'pre-wrap' }}>
              {error.toString()}
            </Typography>
          </Alert>

          <Box display="flex" gap={2} justifyContent="center">
            <Button variant="contained" startIcon={<RefreshIcon />} onClick={this.handleReload}>
              Reload Page
            </Button>
            <Button variant="outlined" onClick={this.handleReset}>
              Try Again
            </Button>
          </Box>

          {import.meta.env.DEV && componentStack && (
            <Typography
              variant="caption"
              color="text.secondary"
              component="pre"
              sx={{ mt: 3, textAlign: 'left', whiteSpace: 'pre-wrap', fontSize: '0.7rem' }}
            >
              {componentStack}
            </Typography>
          )}
        </Paper>
      </Box>
    );
  }
}
