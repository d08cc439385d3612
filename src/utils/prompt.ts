import { createInterface } from "readline";

// Get user input
export const getUserInput = async (question: string): Promise<string> => {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
};

// Get user yes/no confirmation
export const getUserConfirmation = async (question: string): Promise<boolean> => {
  const answer = await getUserInput(`${question} (y/n): `);
  return answer.trim().toLowerCase().startsWith("y");
};
