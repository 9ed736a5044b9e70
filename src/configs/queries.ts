export const PROJECT_TOKEN_QUERY = `query ProjectToken {
  projectToken {
    projectId
    environmentId
    project {
      id
      name
    }
    environment {
      id
      name
    }
  }
}`;

export interface ProjectTokenData {
  projectToken: {
    projectId?: string;
    environmentId?: string;
    project: { id: string; name: string };
    environment: { id: string; name: string };
  };
}
