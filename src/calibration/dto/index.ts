export { CalibrationFileDto } from './calibration-file.dto';
export { CountingLineDto } from './counting-line.dto';
export { SettingsDto } from './settings.dto';
export { PointDto, ZoneDto } from './zone.dto';
