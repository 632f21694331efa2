//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

export type ConfigRootExport = {
  export: ConfigExport;
};

export type ExportFormat = 'csv' | 'json';

export type ConfigExport = {
  directory: string;
  formats: ExportFormat[];
};
