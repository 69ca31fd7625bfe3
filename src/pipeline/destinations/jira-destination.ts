import { jiraAttachmentUrl, jiraBrowseUrl } from '../../integrations/jira-client';
import { PreparedDestination, PublishDestination } from '../publish-pipeline';

/** Attaches artifacts to an existing Jira test execution issue. */
export class JiraDestination implements PublishDestination {
  readonly name = 'jira';

  constructor(
    private readonly baseUrl: string,
    private readonly issueKey: string,
    readonly urlFile: string
  ) {}

  async prepare(): Promise<PreparedDestination> {
    return {
      attachmentUrl: jiraAttachmentUrl(this.baseUrl, this.issueKey),
      successStatuses: [200, 201],
      finalize: async () => jiraBrowseUrl(this.baseUrl, this.issueKey),
    };
  }
}
