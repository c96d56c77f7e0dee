import { useEffect, useState } from 'react';
import Box from '@mui/material/Box';
import Button from '@mui/material/Button';
import Chip from '@mui/material/Chip';
import FormControl from '@mui/material/FormControl';
import InputLabel from '@mui/material/InputLabel';
import ListSubheader from '@mui/material/ListSubheader';
import MenuItem from '@mui/material/MenuItem';
import Select, { type SelectChangeEvent } from '@mui/material/Select';
import Stack from '@mui/material/Stack';
import StopIcon from '@mui/icons-material/Stop';
import { useAtomValue, useSetAtom } from 'jotai';
import { useLocation } from 'wouter';
import { SeriesChart } from '../Charts/SeriesChart';
import { getParameterInfo, isGroupId, type ParameterId } from '../Charts/config/chartConfig';
import { AxisSettings } from './AxisSettings';
import {
  availableParametersAtom,
  deviceAtom,
  droppedFramesAtom,
  samplingRateAtom,
  selectedParameterAtom,
  sessionActiveAtom,
} from '../../store/atoms';
import { endSessionAtom, selectParameterAtom } from '../../store/session';
import { useNotification } from '../../contexts/SnackbarContext';
import { useValidationNotice } from '../../hooks/useValidationNotice';
import { logger } from '../../utils/logger';

function ParameterPicker() {
  const params = useAtomValue(availableParametersAtom);
  const selected = useAtomValue(selectedParameterAtom);
  const selectParameter = useSetAtom(selectParameterAtom);

  const handleChange = (event: SelectChangeEvent<string>) => {
    const param = params.find((p) => p === event.target.value);
    if (param) selectParameter(param);
  };

  // Group entries render as a header item followed by their members
  const items = params.map((param: ParameterId) =>
    isGroupId(param) ? (
      [
        <ListSubheader key={`${param}-header`}>{getParameterInfo(param).label}</ListSubheader>,
        <MenuItem key={param} value={param}>
          {getParameterInfo(param).label} (X,Y,Z)
        </MenuItem>,
      ]
    ) : (
      <MenuItem key={param} value={param} sx={{ pl: 4 }}>
        {getParameterInfo(param).label}
      </MenuItem>
    )
  );

  return (
    <FormControl size="small" sx={{ minWidth: 280 }}>
      <InputLabel id="parameter-select-label">Parameter</InputLabel>
      <Select
        labelId="parameter-select-label"
        label="Parameter"
        value={selected ?? ''}
        onChange={handleChange}
      >
        {items}
      </Select>
    </FormControl>
  );
}

export function DataView() {
  const [, navigate] = useLocation();
  const active = useAtomValue(sessionActiveAtom);
  const device = useAtomValue(deviceAtom);
  const dropped = useAtomValue(droppedFramesAtom);
  const rate = useAtomValue(samplingRateAtom);
  const endSession = useSetAtom(endSessionAtom);
  const { showNotification } = useNotification();
  const [stopping, setStopping] = useState(false);

  useValidationNotice();

  useEffect(() => {
    if (!active) navigate('/');
  }, [active, navigate]);

  const handleStop = async () => {
    setStopping(true);
    try {
      await device?.stopStreaming();
    } catch (error) {
      logger.error('Failed to stop streaming:', error);
      showNotification({
        message: error instanceof Error ? error.message : 'Failed to stop streaming',
        severity: 'error',
      });
    } finally {
      setStopping(false);
      endSession();
    }
  };

  return (
    <Stack spacing={2}>
      <Box display="flex" flexWrap="wrap" gap={2} alignItems="center">
        <ParameterPicker />
        <Chip size="small" label={`${rate.appliedHz.toFixed(2)} Hz`} />
        {dropped > 0 && <Chip size="small" color="warning" label={`${dropped} frames dropped`} />}
        <Box flexGrow={1} />
        <Button
          variant="outlined"
          color="error"
          startIcon={<StopIcon />}
          disabled={stopping}
          onClick={() => void handleStop()}
        >
          Stop
        </Button>
      </Box>
      <SeriesChart />
      <AxisSettings />
    </Stack>
  );
}
