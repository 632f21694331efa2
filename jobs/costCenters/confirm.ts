//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import readline from 'readline/promises';

export type ConfirmApply = (description: string) => Promise<boolean>;

export const confirmOnConsole: ConfirmApply = async (description) => {
  const prompt = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    console.warn(`\nApply mode will make changes: ${description}`);
    const answer = await prompt.question("Type 'apply' to continue: ");
    return answer.trim() === 'apply';
  } finally {
    prompt.close();
  }
};
