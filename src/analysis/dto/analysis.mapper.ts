import { IAnalyseRideInput } from '../models';
import { AnalyseRideDto } from './analyse-ride.dto';

/**
 * DTO validado -> entrada del pipeline
 */
export const toAnalysisInput = (dto: AnalyseRideDto): IAnalyseRideInput => ({
  name: dto.name,
  points: dto.points.map((point) => ({
    lat: point.lat,
    lon: point.lon,
    ele: point.ele,
    time: point.time,
  })),
  toleranceMetres: dto.toleranceMetres,
  parameters: {
    controlSpeedKmh: dto.controlSpeedKmh,
    minControlSeconds: dto.minControlSeconds,
    controlResumptionMetres: dto.controlResumptionMetres,
  },
});
