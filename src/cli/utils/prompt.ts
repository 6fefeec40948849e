import readline from 'readline/promises';

/**
 * yes/no の確認プロンプト
 *
 * 質問は stderr に出す（stdout はコマンド出力用）
 *
 * @param question 質問文
 * @returns trueならyes、falseならno
 */
export async function promptYesNo(question: string): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stderr,
  });

  try {
    while (true) {
      const answer = await rl.question(`${question} (y/n): `);
      const trimmed = answer.trim().toLowerCase();

      if (trimmed === 'y' || trimmed === 'yes') {
        return true;
      }
      if (trimmed === 'n' || trimmed === 'no') {
        return false;
      }

      process.stderr.write('Invalid input. Please enter "y" or "n".\n');
    }
  } finally {
    rl.close();
  }
}
