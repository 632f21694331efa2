//
// Copyright (c) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

declare module 'walk-back' {
  export default function walkBack(startAt: string, lookingFor: string): string | null;
}
