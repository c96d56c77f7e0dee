import { memo } from 'react';
import Box from '@mui/material/Box';
import Chip from '@mui/material/Chip';
import CircularProgress from '@mui/material/CircularProgress';
import { useAtomValue } from 'jotai';
import BluetoothIcon from '@mui/icons-material/Bluetooth';
import CableIcon from '@mui/icons-material/Cable';
import { bridgeConnectedAtom, bridgeReconnectingAtom, bridgeStatusAtom } from '../../store/atoms';

const chipSx = {
  display: { xs: 'none', tablet: 'flex' },
  transition: 'all 0.2s ease-in-out',
  fontWeight: 500,
} as const;

const BridgeStatusChip = memo(function BridgeStatusChip() {
  const connected = useAtomValue(bridgeConnectedAtom);
  return (
    <Chip
      icon={<CableIcon />}
      label="Bridge"
      size="small"
      color={connected ? 'success' : 'error'}
      variant={connected ? 'filled' : 'outlined'}
      sx={chipSx}
    />
  );
});

const DeviceStatusChip = memo(function DeviceStatusChip() {
  const status = useAtomValue(bridgeStatusAtom);
  const connected = status?.connected ?? false;
  return (
    <Chip
      icon={<BluetoothIcon />}
      label={status?.device_name ?? 'Device'}
      size="small"
      color={connected ? (status?.streaming ? 'success' : 'info') : 'default'}
      variant={connected ? 'filled' : 'outlined'}
      sx={chipSx}
    />
  );
});

export function ConnectionStatus() {
  const isReconnecting = useAtomValue(bridgeReconnectingAtom);

  return (
    <Box sx={{ display: 'flex', gap: 1, alignItems: 'center' }}>
      {isReconnecting && (
        <Chip
          icon={<CircularProgress size={14} sx={{ color: 'inherit' }} />}
          label="Reconnecting"
          size="small"
          color="warning"
          variant="outlined"
          sx={{ display: { xs: 'none', sm: 'flex' }, fontWeight: 500 }}
        />
      )}
      <BridgeStatusChip />
      <DeviceStatusChip />
    </Box>
  );
}
