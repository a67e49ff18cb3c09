import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Min,
} from 'class-validator';

/**
 * DTO para iniciar una simulación
 */
export class StartSimulationDto {
  /**
   * Archivo GPX almacenado
   * Ejemplo: "vuelta-parque.gpx"
   */
  @IsString()
  @IsNotEmpty()
  filename!: string;

  /**
   * UDIDs / seriales de los dispositivos objetivo
   * Ejemplo: ["00008030-001A2B3C4D5E6F70", "R58M123ABC"]
   */
  @IsArray()
  @ArrayNotEmpty({ message: 'deviceIds must not be empty' })
  @IsString({ each: true })
  deviceIds!: string[];

  /**
   * Reiniciar la ruta al llegar al final
   */
  @IsBoolean()
  @IsOptional()
  loop?: boolean;

  /**
   * Multiplicador de velocidad (2 = el doble de rápido)
   */
  @IsNumber()
  @IsPositive({ message: 'speed must be greater than 0' })
  @IsOptional()
  speed?: number;

  /**
   * Duración total deseada en segundos
   */
  @IsNumber()
  @IsPositive({ message: 'targetDuration must be greater than 0' })
  @IsOptional()
  targetDuration?: number;

  /**
   * Desviación estándar del jitter en metros (0 = sin jitter)
   */
  @IsNumber()
  @Min(0, { message: 'jitterMeters must be greater than or equal to 0' })
  @IsOptional()
  jitterMeters?: number;

  /**
   * Semilla para un jitter reproducible
   */
  @IsInt()
  @IsOptional()
  seed?: number;
}
