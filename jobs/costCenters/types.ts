//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import type { CostCenterMode } from '../../config/costCenters.types.js';
import type { SyncConfiguration } from '../../config/index.types.js';
import type { IProviders, ISyncJobResult } from '../../interfaces/index.js';
import type { AssignmentRow } from '../../lib/exporter.js';
import type { CommandLineOptions } from './options.js';

export type ModeRunResult = Required<ISyncJobResult> & {
  // exportable user assignments
  rows: AssignmentRow[];
};

export interface ISyncModeHandler {
  readonly name: CostCenterMode;
  // Throws configuration errors before anything remote happens
  validate(config: SyncConfiguration, options: CommandLineOptions): void;
  describe(config: SyncConfiguration, options: CommandLineOptions): string;
  run(providers: IProviders, options: CommandLineOptions): Promise<ModeRunResult>;
}
