import { useState } from 'react';
import Alert from '@mui/material/Alert';
import Box from '@mui/material/Box';
import Button from '@mui/material/Button';
import Card from '@mui/material/Card';
import CardContent from '@mui/material/CardContent';
import Checkbox from '@mui/material/Checkbox';
import CircularProgress from '@mui/material/CircularProgress';
import FormControlLabel from '@mui/material/FormControlLabel';
import Grid from '@mui/material/Grid';
import Typography from '@mui/material/Typography';
import BluetoothIcon from '@mui/icons-material/Bluetooth';
import PlayArrowIcon from '@mui/icons-material/PlayArrow';
import { useAtom, useAtomValue, useSetAtom } from 'jotai';
import { useLocation } from 'wouter';
import { ALL_SENSOR_IDS, SENSORS, type SensorId } from '../Charts/config/chartConfig';
import { bridgeConnectedAtom, bridgeStatusAtom, enabledSensorsAtom } from '../../store/atoms';
import { startSessionAtom } from '../../store/session';
import { bridgeDevice } from '../../hooks/useDeviceBridge';
import { useNotification } from '../../contexts/SnackbarContext';
import { logger } from '../../utils/logger';

/**
 * Sensor selection and device link. Starting a session builds the buffers for
 * the checked sensors and then asks the device to stream.
 */
export function SensorSetup() {
  const [, navigate] = useLocation();
  const [sensors, setSensors] = useAtom(enabledSensorsAtom);
  const bridgeConnected = useAtomValue(bridgeConnectedAtom);
  const status = useAtomValue(bridgeStatusAtom);
  const startSession = useSetAtom(startSessionAtom);
  const { showNotification } = useNotification();
  const [busy, setBusy] = useState(false);

  const deviceConnected = status?.connected ?? false;

  const toggleSensor = (sensor: SensorId, checked: boolean) => {
    setSensors((prev) => {
      const next = new Set(prev);
      if (checked) next.add(sensor);
      else next.delete(sensor);
      return ALL_SENSOR_IDS.filter((s) => next.has(s));
    });
  };

  const handleConnect = async () => {
    setBusy(true);
    try {
      await bridgeDevice.connect();
    } catch (error) {
      logger.error('Failed to connect device:', error);
      showNotification({
        message: error instanceof Error ? error.message : 'Failed to connect device',
        severity: 'error',
      });
    } finally {
      setBusy(false);
    }
  };

  const handleStart = async () => {
    setBusy(true);
    try {
      startSession({ sensors, device: bridgeDevice });
      await bridgeDevice.startStreaming();
      navigate('/data');
    } catch (error) {
      logger.error('Failed to start streaming:', error);
      showNotification({
        message: error instanceof Error ? error.message : 'Failed to start streaming',
        severity: 'error',
      });
    } finally {
      setBusy(false);
    }
  };

  return (
    <Box maxWidth={900} mx="auto">
      <Typography variant="h5" gutterBottom>
        Sensors
      </Typography>

      {!bridgeConnected && (
        <Alert severity="warning" sx={{ mb: 2 }}>
          Bridge not reachable. Start the sensor bridge and this page will reconnect automatically.
        </Alert>
      )}

      <Grid container spacing={2}>
        {ALL_SENSOR_IDS.map((sensor) => (
          <Grid size={{ xs: 12, sm: 6, md: 4 }} key={sensor}>
            <Card variant="outlined" sx={{ height: '100%' }}>
              <CardContent>
                <FormControlLabel
                  control={
                    <Checkbox
                      checked={sensors.includes(sensor)}
                      onChange={(_e, checked) => toggleSensor(sensor, checked)}
                    />
                  }
                  label={SENSORS[sensor].label}
                />
                <Typography variant="body2" color="text.secondary">
                  {SENSORS[sensor].description}
                </Typography>
              </CardContent>
            </Card>
          </Grid>
        ))}
      </Grid>

      <Box display="flex" gap={2} mt={3} alignItems="center">
        <Button
          variant="outlined"
          startIcon={<BluetoothIcon />}
          disabled={!bridgeConnected || deviceConnected || busy}
          onClick={() => void handleConnect()}
        >
          {deviceConnected ? `Connected${status?.device_name ? ` to ${status.device_name}` : ''}` : 'Connect device'}
        </Button>
        <Button
          variant="contained"
          startIcon={busy ? <CircularProgress size={16} color="inherit" /> : <PlayArrowIcon />}
          disabled={!deviceConnected || sensors.length === 0 || busy}
          onClick={() => void handleStart()}
        >
          Start streaming
        </Button>
      </Box>
    </Box>
  );
}
