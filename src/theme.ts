import { createTheme } from '@mui/material/styles';

// Extend MUI theme with a 'tablet' breakpoint
declare module '@mui/material/styles' {
  interface BreakpointOverrides {
    xs: true;
    sm: true;
    tablet: true;
    md: true;
    lg: true;
    xl: true;
  }
}

/**
 * Light and dark schemes. Trace colours in chartConfig are palette paths
 * ("error.main", ...) so X/Y/Z stay red/green/blue in both schemes.
 */
export const theme = createTheme({
  cssVariables: {
    colorSchemeSelector: 'class',
  },

  colorSchemes: {
    light: {
      palette: {
        primary: { main: '#1976d2', light: '#42a5f5', dark: '#1565c0' },
        secondary: { main: '#7b1fa2', light: '#9c27b0', dark: '#4a148c' },
        success: { main: '#2e7d32', light: '#4caf50', dark: '#1b5e20' },
        warning: { main: '#ed6c02', light: '#ff9800', dark: '#e65100' },
        error: { main: '#d32f2f', light: '#ef5350', dark: '#c62828' },
        info: { main: '#0288d1', light: '#03a9f4', dark: '#01579b' },
        background: { default: '#f5f5f5', paper: '#ffffff' },
      },
    },
    dark: {
      palette: {
        primary: { main: '#42a5f5', light: '#90caf9', dark: '#1976d2' },
        secondary: { main: '#ba68c8', light: '#ce93d8', dark: '#8e24aa' },
        success: { main: '#66bb6a', light: '#81c784', dark: '#388e3c' },
        warning: { main: '#ffa726', light: '#ffb74d', dark: '#f57c00' },
        error: { main: '#ef5350', light: '#e57373', dark: '#d32f2f' },
        info: { main: '#29b6f6', light: '#4fc3f7', dark: '#0288d1' },
        background: { default: '#121212', paper: '#1e1e1e' },
      },
    },
  },

  breakpoints: {
    values: {
      xs: 0,
      sm: 600,
      tablet: 768,
      md: 1024,
      lg: 1280,
      xl: 1920,
    },
  },

  typography: {
    fontFamily: ['-apple-system', 'BlinkMacSystemFont', '"Segoe UI"', 'Roboto', 'Arial', 'sans-serif'].join(','),
    h5: { fontSize: '1.25rem', fontWeight: 500 },
    h6: { fontSize: '1rem', fontWeight: 500 },
  },

  shape: {
    borderRadius: 12,
  },

  components: {
    MuiAppBar: {
      defaultProps: {
        enableColorOnDark: true,
      },
    },
    MuiCard: {
      styleOverrides: {
        root: { borderRadius: 12, boxShadow: '0 2px 8px rgba(0,0,0,0.1)' },
      },
    },
    MuiButton: {
      styleOverrides: {
        root: { borderRadius: 8, textTransform: 'none', fontWeight: 500 },
      },
    },
  },
});
