import { ConverterOptions } from "../convert/options";
import { LogLevel } from "../observability/types";

export interface OutputDirs {
  documents: string;
  manifests: string;
}

export interface AppConfig {
  converter: ConverterOptions;
  saveJson: boolean;
  logLevel: LogLevel;
  outputDirs: OutputDirs;
  storePath: string;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "converter" | "outputDirs">> & {
  converter?: Partial<ConverterOptions>;
  outputDirs?: Partial<OutputDirs>;
};
