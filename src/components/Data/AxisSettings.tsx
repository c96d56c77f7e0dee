import { useState, useEffect, type KeyboardEvent } from 'react';
import Box from '@mui/material/Box';
import Card from '@mui/material/Card';
import CardContent from '@mui/material/CardContent';
import FormControlLabel from '@mui/material/FormControlLabel';
import Grid from '@mui/material/Grid';
import Switch from '@mui/material/Switch';
import TextField from '@mui/material/TextField';
import Typography from '@mui/material/Typography';
import { useAtomValue, useSetAtom, useStore } from 'jotai';
import {
  autoRangeEnabledAtom,
  fieldsAtom,
  parameterInfoAtom,
  samplingRateAtom,
} from '../../store/atoms';
import { commitFieldAtom, setAutoRangeAtom } from '../../store/session';
import { FIELD_RULES, type FieldKey } from '../../utils/validation';

interface SettingFieldProps {
  field: FieldKey;
  unit?: string;
  disabled?: boolean;
  helperText?: string;
}

/**
 * Text field bound to one editable setting. Typing only edits a local draft;
 * the value is committed on blur or Enter and the field then shows whatever
 * the store kept (the new value, or the rolled-back one).
 */
function SettingField({ field, unit, disabled = false, helperText }: SettingFieldProps) {
  const store = useStore();
  const committedText = useAtomValue(fieldsAtom)[field].text;
  const commitField = useSetAtom(commitFieldAtom);
  const [draft, setDraft] = useState(committedText);

  useEffect(() => {
    setDraft(committedText);
  }, [committedText]);

  const commit = () => {
    // Enter followed by blur must not apply the same value twice
    if (draft === store.get(fieldsAtom)[field].text) return;
    const result = commitField({ field, text: draft });
    if (result.status !== 'pending') {
      setDraft(store.get(fieldsAtom)[field].text);
    }
  };

  const handleKeyDown = (event: KeyboardEvent<HTMLDivElement>) => {
    if (event.key === 'Enter') commit();
  };

  const label = unit ? `${FIELD_RULES[field].label} (${unit})` : FIELD_RULES[field].label;

  return (
    <TextField
      id={`setting-${field}`}
      label={label}
      size="small"
      fullWidth
      value={draft}
      disabled={disabled}
      helperText={helperText}
      onChange={(e) => setDraft(e.target.value)}
      onBlur={commit}
      onKeyDown={handleKeyDown}
      slotProps={{ htmlInput: { inputMode: 'decimal' } }}
    />
  );
}

export function AxisSettings() {
  const autoRange = useAtomValue(autoRangeEnabledAtom);
  const setAutoRange = useSetAtom(setAutoRangeAtom);
  const info = useAtomValue(parameterInfoAtom);
  const rate = useAtomValue(samplingRateAtom);

  return (
    <Card>
      <CardContent>
        <Box display="flex" justifyContent="space-between" alignItems="center" mb={2}>
          <Typography variant="h6">Display</Typography>
          <FormControlLabel
            control={<Switch checked={autoRange} onChange={(_e, checked) => setAutoRange(checked)} />}
            label="Auto Y range"
          />
        </Box>

        <Grid container spacing={2}>
          <Grid size={{ xs: 6, md: 4 }}>
            <SettingField field="yAxisMin" unit={info?.unit} disabled={autoRange} />
          </Grid>
          <Grid size={{ xs: 6, md: 4 }}>
            <SettingField field="yAxisMax" unit={info?.unit} disabled={autoRange} />
          </Grid>
          <Grid size={{ xs: 6, md: 4 }}>
            <SettingField field="timeWindow" unit="s" />
          </Grid>
          <Grid size={{ xs: 6, md: 4 }}>
            <SettingField field="labelInterval" unit="s" />
          </Grid>
          <Grid size={{ xs: 12, md: 4 }}>
            <SettingField
              field="samplingRate"
              unit="Hz"
              helperText={`Applied: ${rate.appliedHz.toFixed(2)} Hz (divider ${rate.divider})`}
            />
          </Grid>
        </Grid>
      </CardContent>
    </Card>
  );
}
