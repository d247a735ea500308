import { Octokit } from '@octokit/rest';

export interface IssueSource {
  /** Issue keys (`#<number>`) in the milestone titled `milestone`, or null when no such milestone exists. */
  listMilestoneIssueKeys(milestone: string): Promise<string[] | null>;
}

export class GitHubClient implements IssueSource {
  private octokit: Octokit;

  constructor(
    private readonly owner: string,
    private readonly repo: string,
  ) {
    this.octokit = new Octokit({
      auth: process.env.GITHUB_TOKEN,
    });
  }

  async findMilestoneNumber(title: string): Promise<number | null> {
    const milestones = await this.octokit.paginate(
      this.octokit.rest.issues.listMilestones,
      { owner: this.owner, repo: this.repo, state: 'all', per_page: 100 }
    );

    const match = milestones.find(m => m.title === title);
    return match ? match.number : null;
  }

  async listMilestoneIssueKeys(milestone: string): Promise<string[] | null> {
    const number = await this.findMilestoneNumber(milestone);
    if (number === null) {
      return null;
    }

    // Pull requests show up here too; both count as work items for the release.
    const issues = await this.octokit.paginate(
      this.octokit.rest.issues.listForRepo,
      { owner: this.owner, repo: this.repo, milestone: String(number), state: 'all', per_page: 100 }
    );

    return issues
      .map(issue => issue.number)
      .sort((a, b) => a - b)
      .map(n => `#${n}`);
  }
}
